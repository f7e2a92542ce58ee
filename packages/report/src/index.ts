export { evaluateAlerts, formatThresholdAlert, formatVoltageAlert } from './alerts';
export { escapeHtml, formatMetric } from './html';
export { renderSummaryReport } from './summary';
export { countNodes, renderTreeReport } from './tree';
export type { SummaryReportInput } from './summary';
export type { TreeReportInput } from './tree';
