import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { resolveProfiles } from "./crawl";
import { loadConfig } from "./env";
import { createLogger } from "./logger";
import { toWireResult } from "./result";
import { saveCsv, saveJson } from "./save";

async function askUrls(): Promise<string[]> {
  const rl = createInterface({ input, output });
  const ans = await rl.question("Enter search result URL(s), separated by spaces: ");
  rl.close();
  return splitUrls(ans);
}

function splitUrls(raw: string): string[] {
  return raw.split(/[\s,]+/).map((s) => s.trim()).filter(Boolean);
}

/** `--url a --url b`, or bare URLs anywhere in argv. */
function parseArgs(argv: string[]): string[] {
  const urls: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--url") {
      const next = argv[i + 1];
      if (next) urls.push(...splitUrls(next));
      i++;
    } else if (/^https?:\/\//i.test(arg)) {
      urls.push(arg);
    }
  }
  return urls;
}

function makeFilename(ext: "json" | "csv"): string {
  const date = new Date().toISOString().slice(0, 10);
  return `${date} profiles.${ext}`;
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({ debug: config.debug });

  let urls = parseArgs(process.argv.slice(2));
  if (urls.length === 0) urls = await askUrls();
  if (urls.length === 0) {
    console.log("No URLs given.");
    process.exit(0);
  }

  console.log(`\n[1/2] Resolving ${urls.length} URL(s) ...`);
  const report = await resolveProfiles(urls, { config, logger });
  console.log(`[✓] ${report.results.length} resolved, ${report.errors.length} failed.\n`);

  console.log("[2/2] Saving ...");
  const rows = report.results.map(toWireResult);
  const jsonPath = await saveJson(rows, makeFilename("json"), config.outputDir);
  const csvPath = await saveCsv(rows, makeFilename("csv"), config.outputDir);

  for (const error of report.errors) logger.warn(error);

  console.log(`\nDone ✅
JSON: ${jsonPath}
CSV : ${csvPath}\n`);
}

main().catch((e: unknown) => {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
