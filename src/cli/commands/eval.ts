import { DEFAULT_CORPUS_DIR, DEFAULT_DATASET_PATH, loadCorpusDocuments, loadEvaluationDataset } from '../../evaluation/dataset.js';
import { formatEvaluationReport, runEvaluation, type EvaluationReport } from '../../evaluation/runner.js';
import { printJson, type CommandContext } from '../context.js';
import { createProgressBar, formatDuration } from '../progress.js';

export async function evalCommand({ service, args, flags }: CommandContext): Promise<void> {
  const datasetPath = args[0] ?? DEFAULT_DATASET_PATH;
  // The bundled dataset is answered from the bundled corpus; a custom dataset only with --corpus.
  const corpusDir = flags.corpus ?? (args[0] === undefined ? DEFAULT_CORPUS_DIR : undefined);
  const examples = await loadEvaluationDataset(datasetPath);
  const corpus = corpusDir === undefined ? [] : await loadCorpusDocuments(corpusDir);

  const startedAt = Date.now();
  for (const document of corpus) {
    await service.ingestDocument(document.text, document.filename, { document_id: document.documentId });
  }
  const progress = createProgressBar({ total: examples.length, enabled: !flags.json });
  let report: EvaluationReport;
  try {
    report = await runEvaluation(service, examples, () => progress.increment());
  } finally {
    progress.stop();
  }
  if (flags.json) {
    printJson(report);
    return;
  }
  if (corpus.length > 0) {
    console.log(`Indexed ${corpus.length} corpus documents from ${corpusDir}`);
  }
  console.log(formatEvaluationReport(report));
  console.log(`Elapsed: ${formatDuration(Date.now() - startedAt)}`);
}
