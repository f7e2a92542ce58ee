const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string => {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
};

export const formatMetric = (metric?: number): string => {
  return metric === undefined ? 'n/a' : metric.toFixed(1);
};

export const BASE_STYLES = `
  body { margin: 0; padding: 24px; background: #14161a; color: #e4e6eb; font-family: Segoe UI, Arial, sans-serif; }
  h1 { margin: 0 0 4px; font-size: 22px; }
  h2 { margin: 28px 0 10px; font-size: 17px; border-bottom: 1px solid #2c3038; padding-bottom: 4px; }
  h3 { margin: 18px 0 6px; font-size: 14px; color: #9aa3b2; }
  .meta { color: #9aa3b2; font-size: 13px; }
  table { border-collapse: collapse; min-width: 520px; }
  th, td { padding: 5px 12px; text-align: left; border-bottom: 1px solid #2c3038; font-size: 13px; }
  th { color: #9aa3b2; font-weight: 600; }
  .critical { color: #ff6b6b; font-weight: 600; }
  .status-ok { color: #5fd38d; }
  .status-critical, .status-error { color: #ff6b6b; font-weight: 600; }
  .status-highusage { color: #ffb547; font-weight: 600; }
  .status-unavailable { color: #9aa3b2; }
  .alerts { background: #3a1d1f; border: 1px solid #ff6b6b; border-radius: 6px; padding: 10px 14px; }
  .alerts li { margin: 4px 0; }
  .all-clear { background: #1b3326; border: 1px solid #5fd38d; border-radius: 6px; padding: 10px 14px; }
`;

export const renderDocument = (title: string, body: string): string => {
  return [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8" />',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${BASE_STYLES}</style>`,
    '</head>',
    '<body>',
    body,
    '</body>',
    '</html>',
    '',
  ].join('\n');
};
