import { ErrorCode, ValidationError } from "./errors";

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Absolute http(s) url at which a target exposes deployed services.
 * Normalized without a trailing slash, query or fragment.
 */
export class TargetUrl {
  private constructor(private readonly value: string) {}

  static parse(raw: string): TargetUrl {
    let parsed: URL;
    try {
      parsed = new URL(raw.trim());
    } catch {
      throw new ValidationError(ErrorCode.InvalidUrl, `Invalid url "${raw}"`);
    }

    if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
      throw new ValidationError(ErrorCode.InvalidUrl, `Url "${raw}" must use http or https`);
    }
    if (parsed.search || parsed.hash || parsed.username || parsed.password) {
      throw new ValidationError(ErrorCode.InvalidUrl, `Url "${raw}" must not carry credentials, query or fragment`);
    }

    const path = parsed.pathname.replace(/\/+$/, "");
    return new TargetUrl(`${parsed.protocol}//${parsed.host}${path}`);
  }

  equals(other: TargetUrl): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
