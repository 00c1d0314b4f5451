import { printJson, type CommandContext } from '../context.js';
import { formatKeyValue } from '../progress.js';

export async function healthCommand({ service, flags }: CommandContext): Promise<void> {
  const health = service.health();
  const chunks = await service.countChunks();
  if (flags.json) {
    printJson({ ...health, chunks });
    return;
  }
  console.log(
    formatKeyValue([
      { key: 'Status', value: health.status },
      { key: 'Version', value: health.version },
      { key: 'Data dir', value: service.config.dataDir },
      { key: 'Chunks', value: chunks },
      { key: 'Generator', value: service.config.llm.provider },
      { key: 'Vectors', value: service.config.embedding.provider },
    ]),
  );
}
