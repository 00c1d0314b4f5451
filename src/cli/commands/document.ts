import { printJson, requireArgument, type CommandContext } from '../context.js';
import { createError } from '../errors.js';
import { formatBytes, formatKeyValue } from '../progress.js';

export async function documentCommand({ service, args, flags }: CommandContext): Promise<void> {
  const documentId = requireArgument(args, 'Document id', 'sourcewise document <document-id>');
  const document = await service.getDocument(documentId);
  if (!document) {
    throw createError('NOT_FOUND', `Document not found: ${documentId}`, { documentId });
  }

  const summary = {
    documentId: document.id,
    filename: document.filename,
    uploadedAt: document.uploadedAt,
    sizeBytes: document.sizeBytes,
    status: document.status,
    chunks: document.chunks.length,
    metadata: document.metadata,
  };
  if (flags.json) {
    printJson(summary);
    return;
  }
  console.log(
    formatKeyValue([
      { key: 'Document', value: summary.documentId },
      { key: 'Filename', value: summary.filename },
      { key: 'Uploaded', value: summary.uploadedAt },
      { key: 'Size', value: formatBytes(summary.sizeBytes) },
      { key: 'Status', value: summary.status },
      { key: 'Chunks', value: summary.chunks },
    ]),
  );
}
