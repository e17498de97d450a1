/**
 * Compare two parts from the command line.
 *
 * Run (after npm run build):
 *   npm run compare -- 1N4148W-7-F 1N4148WS
 *   npm run compare -- 1N4148W-7-F 1N4148WS --json > report.json
 */
import "dotenv/config";
import { runCompareCli } from "./compareCli.js";

runCompareCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("❌ COMPARE FAILED");
    console.error(err);
    process.exit(1);
  });
