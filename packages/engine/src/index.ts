export {
  SelfPlayDriver,
  DEFAULT_GAMES,
  DEFAULT_SIMULATIONS,
} from "./SelfPlayDriver";
export type {
  SelfPlayDriverOptions,
  MoveEvent,
  GameSummary,
  SelfPlayResult,
} from "./SelfPlayDriver";
export {
  DatasetRecorder,
  DatasetFormatError,
  parseDatasetDocument,
} from "./DatasetRecorder";
export type { DatasetDocument } from "./DatasetRecorder";
export type {
  ISelfPlayGame,
  GameUISpec,
  TrainingRecord,
} from "./interfaces/ISelfPlayGame";
