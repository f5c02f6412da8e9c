#!/usr/bin/env tsx

/**
 * Fetch the current vitals report from Victron VRM and print it as JSON
 * Run with: npm run vitals
 *
 * Settings come from .env.local (see .env.example); diagnostics go to stderr.
 */

import * as dotenv from "dotenv";
import * as path from "path";
import { ERROR_MESSAGES, loadReportConfig, loadVrmConfig } from "../config";
import { VrmClient } from "../lib/vendors/victron/client";
import { VrmReadingProvider } from "../lib/vendors/victron/reading-provider";
import { VitalsReportBuilder } from "../lib/vitals/report-builder";
import { EXIT_CODES, runVitalsReport } from "../lib/vitals/run-report";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });

async function main(): Promise<number> {
  const vrmConfig = loadVrmConfig();
  const reportConfig = loadReportConfig();

  if (!vrmConfig.token) {
    console.error(`❌ ${ERROR_MESSAGES.MISSING_TOKEN}`);
    return EXIT_CODES.FAILED;
  }

  const client = new VrmClient(vrmConfig);
  const provider = new VrmReadingProvider(client, vrmConfig);

  return runVitalsReport({
    provider,
    builder: new VitalsReportBuilder(),
    staleAfterSeconds: reportConfig.staleAfterSeconds,
    write: (text) => process.stdout.write(text),
  });
}

process.on("SIGINT", () => {
  process.exit(EXIT_CODES.INTERRUPTED);
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("❌ Unexpected error:", error);
    process.exitCode = EXIT_CODES.FAILED;
  });
