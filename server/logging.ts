import type { DeploymentError } from "@platform/deployment/domain";
import type { RequestContext } from "./context";

let commandLogging = true;

export function configureLogging(opts: { logCommands: boolean }): void {
  commandLogging = opts.logCommands;
}

export function log(message: string, source = "platform"): void {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

export function logCommandDispatch(command: string, ctx: RequestContext): void {
  if (!commandLogging) return;
  const requester = ctx.userId ?? "anonymous";
  const request = ctx.requestId ? ` request=${ctx.requestId}` : "";
  console.log(`[command-bus] dispatch ${command} | requester=${requester} source=${ctx.source}${request}`);
}

export function logCommandResult(command: string, durationMs: number, error?: DeploymentError): void {
  if (!commandLogging) return;
  const status = error ? `REJECTED kind=${error.kind} code=${error.code}` : "OK";
  console.log(`[command-bus] ${command} ${status} in ${durationMs}ms`);
}
