import path from "path";

export const RUN_REPORT_FILE_NAME = "run_report.json";

export function runReportPath(outputDir: string): string {
  return path.join(outputDir, RUN_REPORT_FILE_NAME);
}
