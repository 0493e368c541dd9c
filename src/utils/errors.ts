/**
 * Request-level errors
 * Provider failures are never thrown; they travel as AdapterOutcome values
 */

export class InvalidRequestError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid ride request: ${issues.join('; ')}`);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}

export class ComparisonCancelledError extends Error {
  constructor(message = 'Comparison cancelled by caller') {
    super(message);
    this.name = 'ComparisonCancelledError';
  }
}

export class GeocodingError extends Error {
  readonly place: string;

  constructor(place: string, message = `Could not geocode: '${place}'`) {
    super(message);
    this.name = 'GeocodingError';
    this.place = place;
  }
}
