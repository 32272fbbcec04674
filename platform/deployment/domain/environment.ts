import { ErrorCode, ValidationError } from "./errors";
import type { TargetId } from "./ids";

export const ENVIRONMENTS = ["production", "staging"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

/** Service name → environment variables. */
export type ServicesEnv = Readonly<Record<string, Readonly<Record<string, string>>>>;

export type EnvironmentConfigData = Readonly<{
  target: TargetId;
  vars: ServicesEnv;
}>;

/** Binding of an app environment to a target, with its deployment variables. */
export class EnvironmentConfig {
  private readonly vars: ServicesEnv;

  constructor(readonly target: TargetId, vars: ServicesEnv = {}) {
    this.vars = cloneVars(vars);
  }

  static fromJSON(data: EnvironmentConfigData): EnvironmentConfig {
    return new EnvironmentConfig(data.target, data.vars);
  }

  variables(): ServicesEnv {
    return cloneVars(this.vars);
  }

  equals(other: EnvironmentConfig): boolean {
    return this.target === other.target && sameVars(this.vars, other.vars);
  }

  toJSON(): EnvironmentConfigData {
    return { target: this.target, vars: this.variables() };
  }
}

function cloneVars(vars: ServicesEnv): ServicesEnv {
  const out: Record<string, Readonly<Record<string, string>>> = {};
  for (const [service, values] of Object.entries(vars)) {
    out[service] = { ...values };
  }
  return out;
}

function sameVars(a: ServicesEnv, b: ServicesEnv): boolean {
  const services = Object.keys(a);
  if (services.length !== Object.keys(b).length) return false;

  return services.every((service) => {
    const left = a[service];
    const right = b[service];
    if (!left || !right) return false;
    const keys = Object.keys(left);
    return keys.length === Object.keys(right).length && keys.every((k) => left[k] === right[k]);
  });
}

const APP_NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export type AppName = string;

export function parseAppName(raw: string): AppName {
  const name = raw.trim();
  if (!APP_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      ErrorCode.InvalidAppName,
      `Invalid app name "${raw}": use lowercase letters, digits and single dashes`,
    );
  }
  return name;
}
