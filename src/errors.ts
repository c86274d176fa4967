/** Write or read failure on the realtime session socket. Not retried. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class CaptureError extends Error {
  exitCode: number | null;

  constructor(message: string, exitCode: number | null = null) {
    super(message);
    this.name = 'CaptureError';
    this.exitCode = exitCode;
  }
}

export class ApiError extends Error {
  statusCode: number;
  body?: string;

  constructor(statusCode: number, message: string, body?: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}
