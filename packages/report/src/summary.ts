import type { SensorKind, SensorReading } from '@rigcheck/sensors';
import type { StressResult } from '@rigcheck/stress';
import { escapeHtml, formatMetric, renderDocument } from './html';

export type SummaryReportInput = {
  generatedAt: string;
  source: string;
  readings: SensorReading[];
  baseline?: SensorReading[];
  results: StressResult[];
  alerts: string[];
};

const KIND_ORDER: SensorKind[] = ['Temperature', 'Load', 'Voltage', 'Fan', 'Power', 'Clock', 'Data'];

const METRIC_LABEL: Record<StressResult['component'], string> = {
  CPU: 'Max temperature (°C)',
  RAM: 'Max load (%)',
  Disk: 'Max load (%)',
  GPU: 'Max temperature (°C)',
};

const readingKey = (reading: SensorReading): string => `${reading.kind}:${reading.name}`;

const isOverThreshold = (reading: SensorReading): boolean => {
  return reading.max !== undefined && reading.value > reading.max;
};

const renderAlerts = (alerts: string[]): string => {
  if (alerts.length === 0) {
    return '<p class="all-clear">No alerts: every reading is within its threshold and all stress tests completed.</p>';
  }
  const items = alerts.map((alert) => `<li>${escapeHtml(alert)}</li>`).join('\n');
  return `<ul class="alerts">\n${items}\n</ul>`;
};

const renderResults = (results: StressResult[]): string => {
  const rows = results.map((result) =>
    [
      '<tr>',
      `<td>${escapeHtml(result.component)}</td>`,
      `<td>${escapeHtml(METRIC_LABEL[result.component])}</td>`,
      `<td>${formatMetric(result.metric)}</td>`,
      `<td class="status status-${result.status.toLowerCase()}">${escapeHtml(result.status)}</td>`,
      '</tr>',
    ].join(''),
  );
  return [
    '<table class="results">',
    '<tr><th>Component</th><th>Metric</th><th>Value</th><th>Status</th></tr>',
    ...rows,
    '</table>',
  ].join('\n');
};

const renderReadingRow = (reading: SensorReading, baseline: Map<string, SensorReading>): string => {
  const before = baseline.get(readingKey(reading));
  const valueClass = isOverThreshold(reading) ? ' class="critical"' : '';
  return [
    '<tr>',
    `<td>${escapeHtml(reading.name)}</td>`,
    `<td>${before ? `${before.value} ${escapeHtml(before.unit)}` : '-'}</td>`,
    `<td${valueClass}>${reading.value} ${escapeHtml(reading.unit)}</td>`,
    `<td>${reading.max === undefined ? '-' : `${reading.max} ${escapeHtml(reading.unit)}`}</td>`,
    '</tr>',
  ].join('');
};

const renderReadings = (readings: SensorReading[], baselineReadings: SensorReading[]): string => {
  if (readings.length === 0) {
    return '<p class="meta">No sensor readings were reported.</p>';
  }
  const baseline = new Map<string, SensorReading>();
  for (const reading of baselineReadings) {
    if (!baseline.has(readingKey(reading))) {
      baseline.set(readingKey(reading), reading);
    }
  }
  const sections: string[] = [];
  for (const kind of KIND_ORDER) {
    const group = readings.filter((reading) => reading.kind === kind);
    if (group.length === 0) {
      continue;
    }
    sections.push(
      [
        `<h3>${kind}</h3>`,
        '<table class="readings">',
        '<tr><th>Sensor</th><th>Before</th><th>Current</th><th>Threshold</th></tr>',
        ...group.map((reading) => renderReadingRow(reading, baseline)),
        '</table>',
      ].join('\n'),
    );
  }
  return sections.join('\n');
};

export const renderSummaryReport = (input: SummaryReportInput): string => {
  const body = [
    '<h1>Hardware health report</h1>',
    `<p class="meta">Generated ${escapeHtml(input.generatedAt)} from ${escapeHtml(input.source)}</p>`,
    `<h2>Alerts (${input.alerts.length})</h2>`,
    renderAlerts(input.alerts),
    '<h2>Stress tests</h2>',
    renderResults(input.results),
    `<h2>Sensors (${input.readings.length})</h2>`,
    renderReadings(input.readings, input.baseline ?? []),
  ].join('\n');
  return renderDocument('Hardware health report', body);
};
