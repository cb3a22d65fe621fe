export type ProblemOptions = {
  status: number;
  code: string;
  message: string;
  details?: Record<string, unknown> | null;
};

export type ProblemBody = {
  type: string;
  code: string;
  message: string;
  details: Record<string, unknown> & { request_id: string | null };
};

/** Error a route throws to answer with a specific problem body. */
export class ProblemError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown> | null;

  constructor(options: ProblemOptions) {
    super(options.message);
    this.name = 'ProblemError';
    this.statusCode = options.status;
    this.code = options.code;
    this.details = options.details;
  }
}

export function problem(options: ProblemOptions): ProblemError {
  return new ProblemError(options);
}

export function toProblemBody(options: ProblemOptions & { requestId?: string | null }): ProblemBody {
  const { code, message, details, requestId } = options;
  return {
    type: 'about:blank',
    code,
    message,
    details: {
      ...(details ?? {}),
      request_id: requestId ?? null,
    },
  };
}
