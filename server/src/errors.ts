export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class HarFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HarFormatError";
  }
}

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Appends the system error code (ECONNREFUSED, ENOTFOUND...) carried on `cause`, if any. */
export const describeFetchError = (error: unknown): string => {
  const message = getErrorMessage(error);
  if (!(error instanceof Error) || !(error.cause instanceof Error)) {
    return message;
  }
  const cause = error.cause;
  const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
  const detail = code ? `${code}: ${cause.message}` : cause.message;
  return detail && detail !== message ? `${message} (${detail})` : message;
};
