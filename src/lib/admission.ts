import type { AccessControl } from "./access";
import { AUDIT_INPUT_PREVIEW_CHARS } from "./constants";
import { CliError } from "./errors";
import type { Logger } from "./logger";
import type { RateLimiter } from "./rate-limiter";
import { type BlockedPattern, BLOCKED_PATTERNS, sanitizeInput } from "./sanitizer";

export interface AdmissionRequest {
  identity: string;
  numericId: string;
  roles: string[];
  /** Free-text argument, such as a lab type, checked before anything interprets it. */
  input?: string;
}

export interface Admission {
  admin: boolean;
  cleaned?: string;
  warning?: string;
}

export interface AdmissionPipelineOptions {
  access: AccessControl;
  rateLimiter: RateLimiter;
  logger: Logger;
  patterns?: readonly BlockedPattern[];
}

/** permission → sanitizer → rate limiter. The first failing stage ends the request. */
export class AdmissionPipeline {
  constructor(private readonly options: AdmissionPipelineOptions) {}

  async admit(request: AdmissionRequest): Promise<Admission> {
    const access = await this.options.access.check(request.identity, request.numericId, request.roles);
    if (!access.allowed) {
      throw new CliError({
        kind: "permission",
        message: access.message,
        data: { reason: access.reason }
      });
    }

    const cleaned = request.input === undefined ? undefined : await this.sanitize(request.input, request.identity);

    const limit = await this.options.rateLimiter.check(request.identity);
    if (!limit.allowed) {
      throw new CliError({
        kind: "rate_limited",
        message: `Rate limit exceeded. Try again in ${limit.waitSeconds} seconds.`,
        data: { waitSeconds: limit.waitSeconds }
      });
    }

    return { admin: access.admin, cleaned, warning: limit.warning };
  }

  /** Resolves the trimmed input, or throws a validation error that never names the matching rule. */
  async sanitize(input: string, identity?: string): Promise<string> {
    const outcome = sanitizeInput(input, this.options.patterns ?? BLOCKED_PATTERNS);
    if (outcome.valid) {
      return outcome.cleaned;
    }

    await this.options.logger.audit(
      "INPUT_BLOCKED",
      {
        identity,
        reason: outcome.reason,
        pattern: outcome.pattern,
        input: input.slice(0, AUDIT_INPUT_PREVIEW_CHARS)
      },
      "warn"
    );
    throw new CliError({ kind: "validation", message: outcome.reason });
  }
}
