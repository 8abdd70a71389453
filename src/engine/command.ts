import { spawn } from "node:child_process";
import { z } from "zod";
import type { DispatchMode } from "../config.js";
import { EngineUnavailableError } from "../errors.js";
import type { EngineOutcome, ExecutionEngine } from "./types.js";

export type CommandEngineOptions = {
  command: string[];
  mode?: DispatchMode;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

const outcomeSchema = z.object({
  event_id: z.string().min(1),
  status: z.enum(["success", "failure"]),
  cost: z.number().nonnegative().default(0),
  tokens: z.number().int().nonnegative().optional(),
  reason: z.string().optional(),
  state: z.record(z.unknown()).optional()
});

const outputSchema = z.union([
  z.array(outcomeSchema),
  z.object({ outcomes: z.array(outcomeSchema) }).transform((value) => value.outcomes)
]);

export const parseEngineOutput = (stdout: string): EngineOutcome[] => {
  const trimmed = stdout.trim();
  if (!trimmed) {
    throw new EngineUnavailableError("Engine produced no output");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    throw new EngineUnavailableError("Engine output is not valid JSON", { cause: error });
  }

  const result = outputSchema.safeParse(parsed);
  if (!result.success) {
    throw new EngineUnavailableError(
      `Engine output has an unexpected shape: ${result.error.issues[0]?.message ?? "unknown"}`
    );
  }
  return result.data;
};

/**
 * Runs an external command per batch. The batch and any cached state go to
 * stdin as `{ events, states }` and the command answers with a JSON array of
 * outcomes on stdout.
 */
export const createCommandEngine = ({
  command,
  mode = "batch",
  env,
  cwd
}: CommandEngineOptions): ExecutionEngine => {
  const [file, ...args] = command;

  return {
    mode,
    execute: (events, { signal, states }) =>
      new Promise<EngineOutcome[]>((resolve, reject) => {
        if (!file) {
          reject(new EngineUnavailableError("No execution command configured"));
          return;
        }

        const child = spawn(file, args, {
          cwd,
          env: { ...process.env, ...env },
          stdio: ["pipe", "pipe", "pipe"],
          signal
        });

        let stdout = "";
        let stderr = "";
        child.stdout.setEncoding("utf8");
        child.stderr.setEncoding("utf8");
        child.stdout.on("data", (chunk: string) => {
          stdout += chunk;
        });
        child.stderr.on("data", (chunk: string) => {
          stderr += chunk;
        });

        child.on("error", (error) => {
          reject(
            new EngineUnavailableError(`Failed to run ${file}: ${error.message}`, { cause: error })
          );
        });

        child.on("close", (code) => {
          if (code !== 0) {
            const detail = stderr.trim().split("\n").slice(-1)[0] ?? "";
            reject(
              new EngineUnavailableError(
                `${file} exited with code ${code ?? "null"}${detail ? `: ${detail}` : ""}`
              )
            );
            return;
          }
          try {
            resolve(parseEngineOutput(stdout));
          } catch (error) {
            reject(error);
          }
        });

        // EPIPE when the command exits without reading stdin; close reports the exit.
        child.stdin.on("error", (error) => {
          stderr += `\n${error.message}`;
        });
        child.stdin.end(JSON.stringify({ events, states: Object.fromEntries(states) }));
      })
  };
};
