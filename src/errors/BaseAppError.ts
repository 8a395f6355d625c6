export type ErrorMeta = Record<string, unknown>;

export class BaseAppError extends Error {
  static ERROR_PREFIX = "groupPreferenceEngine/";

  public code: string = "";
  public message: string = "";
  public meta?: ErrorMeta;

  constructor(meta?: ErrorMeta) {
    super();
    this.meta = meta;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
