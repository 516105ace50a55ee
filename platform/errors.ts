export class EngineError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

/** A required catalog or artifact file is missing. Fatal at startup. */
export class DataNotFound extends EngineError {
  public readonly path: string;

  constructor(path: string) {
    super("DATA_NOT_FOUND", `Required data file not found: ${path}`);
    this.name = "DataNotFound";
    this.path = path;
  }
}

export class InvalidCatalogData extends EngineError {
  constructor(message: string) {
    super("INVALID_CATALOG_DATA", message);
    this.name = "InvalidCatalogData";
  }
}

export class InvalidBudget extends EngineError {
  constructor(message: string) {
    super("INVALID_BUDGET", message);
    this.name = "InvalidBudget";
  }
}

export class InvalidStep extends EngineError {
  constructor(step: number) {
    super("INVALID_STEP", `Step ${step} is outside 1..8`);
    this.name = "InvalidStep";
  }
}

export class UnknownSession extends EngineError {
  constructor(sessionId: string) {
    super("UNKNOWN_SESSION", `Session not found: ${sessionId}`);
    this.name = "UnknownSession";
  }
}

export class SequenceViolation extends EngineError {
  public readonly expectedStep: number;
  public readonly attemptedStep: number;

  constructor(expectedStep: number, attemptedStep: number) {
    super(
      "SEQUENCE_VIOLATION",
      `Step ${attemptedStep} cannot be selected; next step is ${expectedStep}`,
    );
    this.name = "SequenceViolation";
    this.expectedStep = expectedStep;
    this.attemptedStep = attemptedStep;
  }
}

export class CategoryMismatch extends EngineError {
  constructor(componentId: string, expected: string, actual: string) {
    super(
      "CATEGORY_MISMATCH",
      `Component ${componentId} is a ${actual}, step expects ${expected}`,
    );
    this.name = "CategoryMismatch";
  }
}

export class SessionConflict extends EngineError {
  constructor(message: string) {
    super("SESSION_CONFLICT", message);
    this.name = "SessionConflict";
  }
}
