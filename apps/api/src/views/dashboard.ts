import type { TelemetryRecord } from '@tc-telemetry/domain';

export interface DashboardRow {
  id: string;
  longitude: string;
  latitude: string;
  battery: string;
  date: string;
  time: string;
}

export function toDashboardRow(record: TelemetryRecord): DashboardRow {
  return {
    id: record.device_id,
    longitude: record.longitude.toFixed(2),
    latitude: record.latitude.toFixed(2),
    battery: `${record.battery}%`,
    date: record.date,
    time: record.time,
  };
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const COLUMNS: ReadonlyArray<[keyof DashboardRow, string]> = [
  ['id', 'Device ID'],
  ['longitude', 'Longitude'],
  ['latitude', 'Latitude'],
  ['battery', 'Battery'],
  ['date', 'Date'],
  ['time', 'Time'],
];

export function renderDashboard(records: readonly TelemetryRecord[]): string {
  const head = COLUMNS.map(([, label]) => `<th>${label}</th>`).join('');
  const body = records
    .map(toDashboardRow)
    .map((row) => `<tr>${COLUMNS.map(([key]) => `<td>${escapeHtml(row[key])}</td>`).join('')}</tr>`)
    .join('\n');
  const empty = records.length === 0 ? '<p class="empty">No telemetry received yet.</p>' : '';

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Telemetry dashboard</title>
</head>
<body>
<h1>Telemetry</h1>
<p><a href="/download-csv-raw">Raw CSV</a> | <a href="/download-csv-processed">Processed CSV</a></p>
${empty}
<table>
<thead><tr>${head}</tr></thead>
<tbody>
${body}
</tbody>
</table>
</body>
</html>
`;
}
