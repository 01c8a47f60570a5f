// Core pipeline: notation parsing, record normalization, dataset building,
// perspective projection. No file or network access here.

export * from './games/types';
export * from './config';
export * from './errors';

export type { LogEntry, LogLevel, Logger } from './logs/types';
export { LOG_LEVEL_RANK } from './logs/types';
export {
	createConsoleLogger,
	createLogger,
	createMemoryLogger,
	silentLogger,
	type MemoryLogger,
} from './logs/logger';

export { tokenizeMainline } from './pgn/movetext';
export { openingNameFromUrl, titleCase } from './pgn/openingFromUrl';
export {
	parseNotation,
	parsePgnTags,
	extractMovetext,
	type PgnTags,
	countReplayablePlies,
	EMPTY_NOTATION_INFO,
	type NotationInfo,
} from './pgn/parseNotation';

export {
	readRecordFields,
	missingRequiredFields,
	REQUIRED_RECORD_FIELDS,
	RECORD_DEFAULTS,
} from './normalize/recordAccess';
export { deriveTimeFields, EMPTY_TIME_FIELDS, type TimeFields } from './normalize/timeFields';
export { classifyTimeControl } from './normalize/gameType';
export {
	resolveOutcome,
	outcomeFlags,
	OUTCOME_RULES,
	DRAW_TOKENS,
	type Outcome,
	type OutcomeInput,
	type OutcomeRule,
} from './normalize/outcome';
export {
	normalizeRecord,
	type NormalizeRejectReason,
	type NormalizeResult,
} from './normalize/normalizeRecord';

export {
	buildDataset,
	dedupeByUrl,
	sortByEndTime,
	type DatasetBuildResult,
	type DatasetStats,
} from './dataset/buildDataset';
export {
	CANONICAL_COLUMNS,
	NOTATION_COLUMN,
	canonicalRowFromRecord,
	canonicalRowToRecord,
	canonicalTable,
	orderCanonicalColumns,
} from './dataset/canonicalColumns';
export {
	formatCell,
	tableToStringRows,
	type CellValue,
	type StringRecord,
	type Table,
	type TableRecord,
} from './dataset/table';
export { summarizeDataset, type DatasetSummary } from './dataset/summary';

export { difficultyCategory } from './perspective/difficulty';
export { selectTopSubjects, DEFAULT_SUBJECT_COUNT } from './perspective/subjects';
export {
	projectPerspectives,
	toPerspectiveRow,
	type PerspectiveResult,
	type ProjectPerspectivesOptions,
} from './perspective/projectPerspectives';
export { PERSPECTIVE_COLUMNS, perspectiveTable } from './perspective/perspectiveColumns';
