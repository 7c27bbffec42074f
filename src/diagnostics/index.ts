export {
  buildNodeStatusReport,
  collectNodeReport,
  reportExpectations,
  summarizeReports,
  worstStatus,
  type CheckStatus,
  type NodeStatusReport,
  type ReportExpectations,
  type StatusCheck,
  type StatusCheckId,
  type StatusSummary,
} from "./report.js";
