const ISSUE: unique symbol = Symbol('ErrorGuaranteed')

/**
 * Proof that an error-level diagnostic was emitted.
 * Only DiagContext can create one; functions that fail after reporting
 * return it instead of a bare error value.
 */
export class ErrorGuaranteed {
	private readonly issuedBy: typeof ISSUE

	constructor(key: typeof ISSUE) {
		this.issuedBy = key
	}
}

/** Package-internal; not re-exported from the package entry point. */
export function issueErrorGuaranteed(): ErrorGuaranteed {
	return new ErrorGuaranteed(ISSUE)
}
