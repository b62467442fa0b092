import { appendFileSync } from "node:fs";
import { randomUUID } from "node:crypto";
import type { DivergenceReport } from "./rollup-check";

export type Outputs = Record<string, string>;

export function reportOutputs(report: DivergenceReport): Outputs {
  return {
    has_changes: String(report.hasChanges),
    base_tag: report.baseTag,
    ahead: String(report.ahead),
    current_branch: report.currentBranch,
  };
}

/**
 * Renders outputs in the format CI runners read from their output file.
 * Values spanning lines use the `name<<delimiter` form.
 */
export function formatOutputs(
  outputs: Outputs,
  delimiter: () => string = () => `ghadelimiter_${randomUUID()}`,
): string {
  let text = "";
  for (const [name, value] of Object.entries(outputs)) {
    if (/[\r\n]/.test(value)) {
      const d = delimiter();
      text += `${name}<<${d}\n${value}\n${d}\n`;
    } else {
      text += `${name}=${value}\n`;
    }
  }
  return text;
}

/**
 * Prints outputs to stdout and, when the runner names an output file in
 * GITHUB_OUTPUT, appends them there as well.
 */
export function emitOutputs(
  outputs: Outputs,
  env: NodeJS.ProcessEnv = process.env,
  write: (text: string) => void = (text) => process.stdout.write(text),
) {
  const text = formatOutputs(outputs);
  write(text);
  const file = env["GITHUB_OUTPUT"];
  if (file) {
    appendFileSync(file, text, "utf8");
  }
}
