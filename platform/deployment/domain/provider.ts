import { z } from "zod";
import { ErrorCode, ValidationError } from "./errors";

export type ProviderConfigData = Readonly<{ kind: string } & Record<string, unknown>>;

/**
 * Provider specific connection data of a target.
 *
 * The fingerprint identifies the underlying resource (a docker host, a
 * cluster...). Two targets could never share one and it is immutable once a
 * target has been created with it.
 */
export interface ProviderConfig {
  readonly kind: string;
  fingerprint(): string;
  equals(other: ProviderConfig): boolean;
  toJSON(): ProviderConfigData;
}

const dockerConfigSchema = z
  .object({
    kind: z.literal("docker"),
    host: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    port: z.number().int().positive().max(65535).optional(),
    privateKey: z.string().min(1).optional(),
  })
  .strict();

export const providerConfigSchema = z.discriminatedUnion("kind", [dockerConfigSchema]);

export type DockerConfigData = z.infer<typeof dockerConfigSchema>;

export class DockerProviderConfig implements ProviderConfig {
  readonly kind = "docker";

  constructor(private readonly data: Omit<DockerConfigData, "kind"> = {}) {}

  /** Local engine when no remote host is set. */
  fingerprint(): string {
    return this.data.host ?? "";
  }

  equals(other: ProviderConfig): boolean {
    if (!(other instanceof DockerProviderConfig)) return false;
    return (
      this.data.host === other.data.host &&
      this.data.user === other.data.user &&
      this.data.port === other.data.port &&
      this.data.privateKey === other.data.privateKey
    );
  }

  toJSON(): DockerConfigData {
    return { kind: this.kind, ...this.data };
  }

  toString(): string {
    return this.data.host ? `docker@${this.data.host}` : "docker@local";
  }
}

export function parseProviderConfig(raw: unknown): ProviderConfig {
  const result = providerConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError(ErrorCode.InvalidProviderConfig, "Invalid provider configuration", details);
  }

  const { kind: _kind, ...data } = result.data;
  return new DockerProviderConfig(data);
}
