import { describeConfig, loadProviderConfig } from "../services/providerConfig.js";
import { runComparison } from "../services/runComparison.js";
import { formatComparisonTable } from "../services/compareAttributes.js";
import type { HttpFetch } from "../services/providerHttp.js";

export interface CompareCliOptions {
  env?: Record<string, string | undefined>;
  fetchImpl?: HttpFetch;
  // where the report goes; diagnostics never do
  write?: (text: string) => void;
}

const USAGE = "Usage: runOne <mpnLeft> <mpnRight> [--json]";

/**
 * Returns the process exit code. With --json, stdout carries only the
 * report: every log line is sent to stderr while the comparison runs.
 */
export async function runCompareCli(args: string[], options: CompareCliOptions = {}): Promise<number> {
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const asJson = args.includes("--json");
  const [mpnLeft, mpnRight] = args.filter(a => !a.startsWith("--"));

  if (!mpnLeft || !mpnRight) {
    console.error(USAGE);
    return 2;
  }

  const log = console.log;
  if (asJson) {
    console.log = (...items: unknown[]) => console.error(...items);
  }

  try {
    const config = loadProviderConfig(options.env);
    console.log("[config] providers:", describeConfig(config));

    const report = await runComparison(
      { mpnLeft, mpnRight },
      { config, fetchImpl: options.fetchImpl }
    );
    write(asJson ? JSON.stringify(report, null, 2) : formatComparisonTable(report));
    return 0;
  } finally {
    console.log = log;
  }
}
