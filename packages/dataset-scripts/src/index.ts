/**
 * @ekadashi/dataset-scripts
 *
 * One-shot converters for the Ekadashi calendar datasets, plus a verifier.
 */

export { loadConfig, getConfigSummary, configSchema, envMapping, DEFAULT_CORRECTIONS_PATH } from './config/index.js';
export type { Config } from './config/index.js';

export { readJsonFile, writeJsonFile, serializeDocument, validateDocument, orderKeysLike } from './io.js';

export { correctionRecordSchema, correctionTableSchema, loadCorrectionTable } from './corrections.js';
export type { CorrectionRecord, CorrectionTable } from './corrections.js';

export { convertRawEntries, buildRawDocument, runRawConversion } from './raw-converter.js';
export type { RawConversionConfig } from './raw-converter.js';

export { correctDataset, runCorrection } from './corrector.js';
export type { CorrectionConfig, CorrectionOptions, CorrectionResult, EntryOutcome, EntryAction } from './corrector.js';

export { verifyDataset, runVerification } from './verify.js';
export type {
  VerificationConfig,
  VerifyOptions,
  VerificationReport,
  VerificationIssue,
  IssueSeverity,
} from './verify.js';

export { runScript, createScriptLoggers } from './cli.js';
export type { ScriptContext, ScriptLoggers } from './cli.js';
