export type BomErrorCode =
  | 'INVALID_GEOMETRY'
  | 'UNRESOLVED_OPTION'
  | 'UNKNOWN_CATALOG_PART'
  | 'INTERNAL_INVARIANT_VIOLATION';

/**
 * Base class for every failure the BOM engine reports.
 * All of them are deterministic: re-running with the same input fails the same way.
 */
export class BomError extends Error {
  readonly code: BomErrorCode;

  constructor(code: BomErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidGeometryError extends BomError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_GEOMETRY', `Invalid tank geometry: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class UnresolvedOptionError extends BomError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('UNRESOLVED_OPTION', `Unresolved option: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class UnknownCatalogPartError extends BomError {
  readonly partNo: string;

  constructor(partNo: string) {
    super('UNKNOWN_CATALOG_PART', `Part ${partNo} has no catalog entry`);
    this.partNo = partNo;
  }
}

export class InternalInvariantViolationError extends BomError {
  constructor(message: string) {
    super('INTERNAL_INVARIANT_VIOLATION', message);
  }
}
