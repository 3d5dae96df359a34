/**
 * Command-line driver for the Corvid front end.
 */

export { Driver, type DriverIo, type DriverLogger, type DriverOptions, defaultIo } from './driver.ts'
export { type Explanation, explain, formatExplanation } from './explain.ts'
export { createFormatter, type TokenFormatter } from './output/formatter.ts'
export { JsonFormatter, type JsonTokenDocument } from './output/json.ts'
export { escapeValue, TextFormatter } from './output/text.ts'
export {
	DEFAULT_LEXER_PHASE_OPTIONS,
	type LexerPhaseError,
	type LexerPhaseErrorKind,
	LexerPhase,
	type LexerPhaseOptions,
	type LexResult,
	type PhaseResult,
} from './phases/lexer.ts'
export {
	type DriverFailure,
	driverFailure,
	formatFailure,
	formatReadError,
	getErrorMessage,
	isNodeError,
	isOutputFormat,
	type OutputFormat,
	type ReadFailure,
	type ReadFailureKind,
} from './utils.ts'
export { VERSION } from './version.ts'
