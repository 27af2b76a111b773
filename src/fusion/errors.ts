export type FusionStateCode = "not_finalized" | "already_finalized";

export class FusionStateError extends Error {
  readonly code: FusionStateCode;

  constructor(code: FusionStateCode, message: string) {
    super(message);
    this.name = "FusionStateError";
    this.code = code;
  }
}
