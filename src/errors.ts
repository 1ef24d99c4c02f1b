export class DesignSpecError extends Error {
  constructor(message: string, public status: number) {
    super(message);
    this.name = 'DesignSpecError';
  }
}

/** Bad input from the caller (missing payload, unsupported URL). */
export class RequestError extends DesignSpecError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'RequestError';
  }
}

/** The page to convert answered with something other than 200. */
export class UpstreamError extends DesignSpecError {
  constructor(public upstreamStatus: number) {
    super(`Failed to fetch URL. Status code: ${upstreamStatus}`, upstreamStatus);
    this.name = 'UpstreamError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
