/** Base class for every error raised by the engine and its shell. */
export class LaiPiiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A span whose offsets do not describe a non-empty range of the text. */
export class InvalidSpanError extends LaiPiiError {
  readonly start: number;
  readonly end: number;

  constructor(start: number, end: number, textLength: number) {
    super(
      `Invalid span [${start}, ${end}) for text of length ${textLength}`
    );
    this.start = start;
    this.end = end;
  }
}

/** A lexicon set is missing or empty. */
export class LexiconNotLoadedError extends LaiPiiError {
  readonly set: string;

  constructor(set: string, message = `Lexicon set "${set}" is empty or missing`) {
    super(message);
    this.set = set;
  }
}

/** A training-data document does not follow the interchange format. */
export class TrainingDataError extends LaiPiiError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid training data: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** The CSV batch input cannot be processed as a whole. */
export class BatchInputError extends LaiPiiError {}

/** Classifier options outside their allowed range. */
export class InvalidOptionsError extends LaiPiiError {}
