export class DialogueError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = "DialogueError";
  }
}

/**
 * Malformed script text. No document is produced.
 */
export class ParseFailure extends DialogueError {
  constructor(
    public readonly reason: string,
    public readonly lineNumber: number,
    public readonly text: string
  ) {
    super(`Line ${lineNumber}: ${reason}: ${JSON.stringify(text)}`, 400);
    this.name = "ParseFailure";
  }
}

export class ValidationFailure extends DialogueError {
  constructor(message: string, public readonly rule: string) {
    super(message, 422);
    this.name = "ValidationFailure";
  }
}

export class BuildFailure extends DialogueError {
  constructor(message: string) {
    super(message, 422);
    this.name = "BuildFailure";
  }
}

export class IllegalState extends DialogueError {
  constructor(message: string) {
    super(message, 409);
    this.name = "IllegalState";
  }
}

export class ChoiceOutOfRange extends DialogueError {
  constructor(public readonly index: number, public readonly optionCount: number) {
    super(`Choice ${index} is out of range; ${optionCount} option(s) are available`, 400);
    this.name = "ChoiceOutOfRange";
  }
}

export class UnknownMarker extends DialogueError {
  constructor(public readonly markerName: string) {
    super(`No marker named ${markerName} exists in this script`, 404);
    this.name = "UnknownMarker";
  }
}

export class NotFound extends DialogueError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFound";
  }
}
