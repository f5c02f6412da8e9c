/**
 * JSON utilities for the vitals report
 *
 * Non-ASCII keys and text ("generación", alarm messages in Spanish) are
 * written verbatim; JSON.stringify never escapes them.
 */

import type { VitalsReport } from "@/lib/vitals/types";

const INDENT = 2;

/**
 * Serialize a report exactly as printed by the CLI
 */
export function serializeReport(report: VitalsReport): string {
  return JSON.stringify(report, null, INDENT);
}

