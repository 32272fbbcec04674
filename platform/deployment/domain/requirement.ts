import type { DeploymentError } from "./errors";
import { appNameAlreadyTaken, configAlreadyTaken, targetNotFound, urlAlreadyTaken } from "./errors";
import type { ProviderConfig } from "./provider";
import type { TargetUrl } from "./url";
import type { EnvironmentConfig } from "./environment";

/**
 * A candidate value bundled with facts resolved against storage before
 * reaching the domain (uniqueness, existence...).
 *
 * Aggregates never query a store: they receive requirements and call `met()`,
 * which returns the value or throws the first unmet fact's error.
 */
export class Requirement<T> {
  private constructor(
    readonly value: T,
    private readonly failure: (() => DeploymentError) | undefined,
  ) {}

  static of<T>(value: T, facts: ReadonlyArray<readonly [boolean, () => DeploymentError]>): Requirement<T> {
    const unmet = facts.find(([satisfied]) => !satisfied);
    return new Requirement(value, unmet?.[1]);
  }

  get isSatisfied(): boolean {
    return this.failure === undefined;
  }

  met(): T {
    if (this.failure) throw this.failure();
    return this.value;
  }
}

export type TargetUrlRequirement = Requirement<TargetUrl>;
export type ProviderConfigRequirement = Requirement<ProviderConfig>;
export type EnvironmentConfigRequirement = Requirement<EnvironmentConfig>;

export function targetUrlRequirement(url: TargetUrl, unique: boolean): TargetUrlRequirement {
  return Requirement.of(url, [[unique, urlAlreadyTaken]]);
}

export function providerConfigRequirement(config: ProviderConfig, unique: boolean): ProviderConfigRequirement {
  return Requirement.of(config, [[unique, configAlreadyTaken]]);
}

export function environmentConfigRequirement(
  config: EnvironmentConfig,
  targetFound: boolean,
  nameAvailable: boolean,
): EnvironmentConfigRequirement {
  return Requirement.of(config, [
    [targetFound, targetNotFound],
    [nameAvailable, appNameAlreadyTaken],
  ]);
}
