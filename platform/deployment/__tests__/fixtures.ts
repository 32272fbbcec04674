import {
  DeploymentError,
  EnvironmentConfig,
  Target,
  TargetUrl,
  environmentConfigRequirement,
  isEventOfType,
  providerConfigRequirement,
  targetUrlRequirement,
  type DomainEvent,
  type DomainEventOf,
  type DomainEventType,
  type ProviderConfig,
  type ProviderConfigData,
} from "../domain";

export class DummyProviderConfig implements ProviderConfig {
  readonly kind = "dummy";

  constructor(
    private readonly data = "",
    private readonly print = "",
  ) {}

  fingerprint(): string {
    return this.print;
  }

  equals(other: ProviderConfig): boolean {
    return other instanceof DummyProviderConfig && other.data === this.data && other.print === this.print;
  }

  toJSON(): ProviderConfigData {
    return { kind: this.kind, data: this.data, fingerprint: this.print };
  }
}

/** Runs `fn` and returns the code of the DeploymentError it throws, if any. */
export function errorCodeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof DeploymentError) return err.code;
    throw err;
  }
  return undefined;
}

export const UID = "uid";

export function makeTarget(url = "http://my-url.com", config: ProviderConfig = new DummyProviderConfig()): Target {
  return Target.create(
    "my-target",
    targetUrlRequirement(TargetUrl.parse(url), true),
    providerConfigRequirement(config, true),
    UID,
  );
}

/** A target whose first configuration attempt succeeded. */
export function makeReadyTarget(): Target {
  const target = makeTarget();
  target.configured(target.currentVersion());
  return target;
}

export function envRequirement(target: string, vars: Record<string, Record<string, string>> = {}) {
  return environmentConfigRequirement(new EnvironmentConfig(target, vars), true, true);
}

type HasEvents = { pendingEvents(): readonly DomainEvent[] };

export function eventTypes(aggregate: HasEvents): string[] {
  return aggregate.pendingEvents().map((e) => e.type);
}

/** The pending event at `index`, which must be of `type`. */
export function eventAt<T extends DomainEventType>(aggregate: HasEvents, index: number, type: T): DomainEventOf<T> {
  const event = aggregate.pendingEvents()[index];
  if (!event || !isEventOfType(event, type)) {
    throw new Error(`Expected ${type} at ${index}, got ${event?.type ?? "nothing"}`);
  }
  return event;
}
