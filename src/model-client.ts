import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  AuthenticationError,
  BadRequestError,
  InternalServerError,
  PermissionDeniedError,
  RateLimitError
} from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from "openai/resources/chat/completions";
import { ModelError } from "./errors.js";
import type { ModelUsage } from "./types.js";

export interface ModelRequest {
  model: string;
  temperature: number;
  messages: ChatCompletionMessageParam[];
  timeoutMs: number;
  jsonMode: boolean;
}

export interface ModelCompletion {
  content: string;
  model: string;
  latencyMs: number;
  usage?: ModelUsage;
}

/** The only seam between the decision engine or judge and a hosted model. */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelCompletion>;
}

export interface OpenAiModelClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class OpenAiModelClient implements ModelClient {
  private readonly client: OpenAI;

  constructor(options: OpenAiModelClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      // Retries happen in the decision engine.
      maxRetries: 0
    });
  }

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    const startedAt = Date.now();
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      temperature: request.temperature,
      messages: request.messages
    };
    if (request.jsonMode) {
      body.response_format = { type: "json_object" };
    }

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(body, { timeout: request.timeoutMs });
    } catch (error) {
      throw toModelError(error);
    }

    const content = response.choices[0]?.message.content;
    if (typeof content !== "string" || content.trim().length === 0) {
      throw new ModelError("malformed_response", "Model returned no message content");
    }

    return {
      content,
      model: response.model,
      latencyMs: Date.now() - startedAt,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens
          }
        : undefined
    };
  }
}

export function createOpenAiModelClient(
  options: { apiKeyEnv: string; baseUrl?: string; timeoutMs?: number },
  env: NodeJS.ProcessEnv = process.env
): OpenAiModelClient {
  const apiKey = env[options.apiKeyEnv]?.trim();
  if (!apiKey) {
    throw new ModelError("missing_api_key", `Missing API key env var '${options.apiKeyEnv}'`);
  }
  return new OpenAiModelClient({ apiKey, baseUrl: options.baseUrl, timeoutMs: options.timeoutMs });
}

export function toModelError(error: unknown): ModelError {
  if (error instanceof ModelError) {
    return error;
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new ModelError("timeout", "Model request timed out", { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new ModelError("transport", `Model connection failed: ${error.message}`, { cause: error });
  }
  if (error instanceof RateLimitError) {
    return error.code === "insufficient_quota"
      ? new ModelError("quota", `Model quota exhausted: ${error.message}`, { cause: error })
      : new ModelError("rate_limit", `Model rate limited: ${error.message}`, { cause: error });
  }
  if (error instanceof AuthenticationError || error instanceof PermissionDeniedError) {
    return new ModelError("auth", `Model request not authorized: ${error.message}`, { cause: error });
  }
  if (error instanceof BadRequestError) {
    return new ModelError("bad_request", `Model rejected request: ${error.message}`, { cause: error });
  }
  if (error instanceof InternalServerError) {
    return new ModelError("server", `Model server error: ${error.message}`, { cause: error });
  }
  if (error instanceof APIError) {
    return new ModelError("bad_request", `Model API error ${error.status ?? "?"}: ${error.message}`, { cause: error });
  }
  return new ModelError("transport", error instanceof Error ? error.message : String(error), { cause: error });
}
