import { AskshellError } from "./base.js";

/**
 * The model endpoint failed: non-2xx status, network error or timeout.
 */
export class ModelRequestError extends AskshellError<"MODEL_REQUEST_FAILED"> {
  readonly _tag = "ExternalError" as const;
  readonly endpoint: string;
  readonly status: number | undefined;

  constructor(endpoint: string, reason: string, status?: number, cause?: unknown) {
    super({
      code: "MODEL_REQUEST_FAILED",
      message: `Model request to ${endpoint} failed: ${reason}`,
      metadata: { endpoint, ...(status !== undefined ? { status: String(status) } : {}) },
      cause,
    });
    this.endpoint = endpoint;
    this.status = status;
  }
}

/**
 * The model endpoint answered HTTP 429.
 */
export class ModelRateLimitedError extends AskshellError<"MODEL_RATE_LIMITED"> {
  readonly _tag = "RateLimitError" as const;
  readonly endpoint: string;

  constructor(endpoint: string) {
    super({
      code: "MODEL_RATE_LIMITED",
      message: `Model endpoint ${endpoint} is rate limiting requests`,
      metadata: { endpoint },
    });
    this.endpoint = endpoint;
  }
}

/**
 * The model returned no choices, or only whitespace.
 */
export class ModelEmptyResponseError extends AskshellError<"MODEL_EMPTY_RESPONSE"> {
  readonly _tag = "ExternalError" as const;
  readonly model: string;

  constructor(model: string) {
    super({
      code: "MODEL_EMPTY_RESPONSE",
      message: `Model "${model}" returned an empty response; check the model name and endpoint`,
      metadata: { model },
    });
    this.model = model;
  }
}
