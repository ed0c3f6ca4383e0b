/**
 * Audit/reporting module — thin facade over report/sim_report.
 */
export {
  generateReport,
  writeReportToFile,
  type ReportInput,
  type ReportResult,
} from "../report/sim_report";
