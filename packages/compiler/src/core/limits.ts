/**
 * Hard limits on input size.
 */
export const LIMITS = {
	/** Largest source file accepted by the lexer phase, in bytes */
	maxFileSize: 16 * 1024 * 1024,
	/** Longest single token, in bytes; longer tokens are reported (L1041) */
	maxTokenLength: 0xffff,
} as const
