/**
 * Command-line argument parsing for the researcher runner
 *
 * Usage:
 *   researcher "<subject>" [--general=N] [--academic=N]
 */

export interface CliArgs {
  subject: string;
  general?: number;
  academic?: number;
}

export const USAGE = `Usage:
  npm run research -- "<subject>" [--general=N] [--academic=N]

Options:
  --general=N   Number of general web queries (default: from research-config.yaml)
  --academic=N  Number of academic queries (default: from research-config.yaml)`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseCount(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new CliUsageError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse argv (without the node and script entries)
 */
export function parseCliArgs(args: string[]): CliArgs {
  const positional: string[] = [];
  const result: Omit<CliArgs, "subject"> = {};

  for (const arg of args) {
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const [name, ...rest] = arg.slice(2).split("=");
    const value = rest.join("=");
    if (name !== "general" && name !== "academic") {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    if (!value) {
      throw new CliUsageError(`--${name} needs a value, e.g. --${name}=3`);
    }
    result[name] = parseCount(name, value);
  }

  const subject = positional.join(" ").trim();
  if (!subject) {
    throw new CliUsageError("Missing research subject");
  }

  return { subject, ...result };
}
