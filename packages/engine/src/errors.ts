export class RootFindingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RootFindingError";
  }
}

export class SignEvaluationError extends RootFindingError {
  constructor(
    message: string,
    public readonly z: number,
    public readonly x: number,
  ) {
    super(message);
    this.name = "SignEvaluationError";
  }
}

export class RootRefinementError extends RootFindingError {
  constructor(
    public readonly lo: number,
    public readonly hi: number,
    public readonly reason: string,
  ) {
    super(`could not refine root in [${lo}, ${hi}]: ${reason}`);
    this.name = "RootRefinementError";
  }
}
