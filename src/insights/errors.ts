/**
 * Raised when an indicator series breaks the input contract:
 * duplicate or unknown period labels, non-finite values, missing name.
 * Carries the offending indicator id so batch callers can report it.
 */
export class InputError extends Error {
  constructor(
    message: string,
    public indicatorId: number | null = null
  ) {
    super(indicatorId === null ? message : `Indicator ${indicatorId}: ${message}`);
    this.name = 'InputError';
  }
}
