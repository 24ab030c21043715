/**
 * Run Daily Report
 *
 * Builds and stores the report for one day (or the week ending on it).
 * Defaults to yesterday, which is what the scheduled run uses.
 *
 * Usage:
 *   tsx server/scripts/runDailyReport.ts [YYYY-MM-DD] [--weekly]
 */

import { buildDailyReport, buildWeeklyReport, createAnalysisDeps, defaultReportDate } from "../analysis";
import { getErrorMessage } from "../utils/errorHandler";

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const weekly = args.includes("--weekly");
    const reportDate = args.find(arg => !arg.startsWith("--")) ?? defaultReportDate();

    const deps = createAnalysisDeps();
    const build = weekly ? buildWeeklyReport : buildDailyReport;
    const label = weekly ? "Weekly" : "Daily";

    console.log(`\n📊 ${label} Report: ${reportDate}`);
    console.log("=".repeat(50));

    const report = await build(reportDate, deps);
    if (!report) {
        console.log("No meetings recorded in this window; nothing to report.");
        return;
    }

    console.log(`Meetings: ${report.meetingTitles.join(", ")}`);
    console.log(`Template: ${report.templateUsed} v${report.templateVersion ?? "custom"}`);
    console.log(`Model: ${report.modelUsed}`);
    console.log(`Statements: ${report.totalStatements}`);
    console.log("\nParticipants:");
    for (const p of report.participantSummary) {
        console.log(`  - ${p.name}: ${p.speakCount} statements (${p.participationRate}%), ${p.totalWords} words`);
    }
    console.log("=".repeat(50));

    if (report.status === "error") {
        console.error(`\n❌ Report failed (${report.errorKind}): ${report.error}`);
        process.exitCode = 1;
        return;
    }

    console.log("\n✅ Report stored\n");
    console.log(report.analysis);
}

main().catch((error: unknown) => {
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exit(1);
});
