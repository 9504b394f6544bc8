export { formatDiagnostic, formatReportAsText } from './report-formatter.js';
export { formatReportForMcp } from './mcp-formatter.js';
export type { MCPSummary, MCPFormattedReport } from './mcp-formatter.js';
export { formatSubject } from './utils.js';
