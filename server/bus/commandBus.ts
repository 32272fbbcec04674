import type { z } from "zod";
import { DeploymentError, ErrorCode, ValidationError } from "@platform/deployment/domain";
import type { RequestContext } from "../context";
import { logCommandDispatch, logCommandResult } from "../logging";

export type CommandResult<T> = { ok: true; value: T } | { ok: false; error: DeploymentError };

export type CommandDefinition<TInput, TResult> = {
  readonly name: string;
  readonly schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  readonly handle: (ctx: RequestContext, input: TInput) => Promise<TResult>;
};

type RegisteredCommand = (ctx: RequestContext, payload: unknown) => Promise<CommandResult<unknown>>;

/**
 * Single entry point for every command.
 *
 * Payloads are validated against the command schema before reaching the
 * handler. Domain failures come back as `{ ok: false }` results; anything
 * else is a programmer error and propagates.
 */
export class CommandBus {
  private readonly commands = new Map<string, RegisteredCommand>();

  register<TInput, TResult>(definition: CommandDefinition<TInput, TResult>): this {
    if (this.commands.has(definition.name)) {
      throw new Error(`Command "${definition.name}" is already registered`);
    }
    this.commands.set(definition.name, (ctx, payload) => this.execute(ctx, definition, payload));
    return this;
  }

  registered(): string[] {
    return Array.from(this.commands.keys()).sort();
  }

  async execute<TInput, TResult>(
    ctx: RequestContext,
    definition: CommandDefinition<TInput, TResult>,
    payload: unknown,
  ): Promise<CommandResult<TResult>> {
    const started = Date.now();
    logCommandDispatch(definition.name, ctx);

    const parsed = definition.schema.safeParse(payload);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      const error = new ValidationError(ErrorCode.InvalidCommand, `Invalid ${definition.name} command`, details);
      logCommandResult(definition.name, Date.now() - started, error);
      return { ok: false, error };
    }

    try {
      const value = await definition.handle(ctx, parsed.data);
      logCommandResult(definition.name, Date.now() - started);
      return { ok: true, value };
    } catch (err) {
      if (err instanceof DeploymentError) {
        logCommandResult(definition.name, Date.now() - started, err);
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  /** Runs a registered command by name, for callers that only hold raw input. */
  async dispatch(ctx: RequestContext, name: string, payload: unknown): Promise<CommandResult<unknown>> {
    const command = this.commands.get(name);
    if (!command) {
      return { ok: false, error: new ValidationError(ErrorCode.InvalidCommand, `Unknown command "${name}"`) };
    }
    return command(ctx, payload);
  }
}
