import type { TeamSummary } from './types.js';

const PALETTE = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd', '#8c564b', '#e377c2', '#7f7f7f'];

const CHART_TITLE = 'Comments by Team';

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function colorAt(index: number): string {
  return PALETTE[index % PALETTE.length];
}

function n(value: number): string {
  return value.toFixed(2);
}

function svgDocument(width: number, height: number, body: string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
    `<text x="${width / 2}" y="28" text-anchor="middle" font-size="18">${CHART_TITLE}</text>`,
    ...body,
    '</svg>',
    '',
  ].join('\n');
}

/**
 * Percentage label for one slice, one decimal place.
 */
export function formatShare(count: number, total: number): string {
  return `${((count / total) * 100).toFixed(1)}%`;
}

/**
 * Pie chart of each team's share of the kept comments.
 */
export function renderPieChart(summary: TeamSummary[]): string {
  const width = 480;
  const height = 420;
  const cx = 240;
  const cy = 230;
  const r = 160;
  const total = summary.reduce((sum, s) => sum + s.commentCount, 0);
  const body: string[] = [];

  if (total === 0) return svgDocument(width, height, body);

  let angle = -Math.PI / 2;
  summary.forEach((entry, i) => {
    const share = entry.commentCount / total;
    const sweep = share * 2 * Math.PI;
    const color = colorAt(i);

    if (share >= 1) {
      body.push(`<circle cx="${cx}" cy="${cy}" r="${r}" fill="${color}"/>`);
    } else if (share > 0) {
      const x0 = cx + r * Math.cos(angle);
      const y0 = cy + r * Math.sin(angle);
      const x1 = cx + r * Math.cos(angle + sweep);
      const y1 = cy + r * Math.sin(angle + sweep);
      const largeArc = sweep > Math.PI ? 1 : 0;
      body.push(
        `<path d="M ${cx} ${cy} L ${n(x0)} ${n(y0)} A ${r} ${r} 0 ${largeArc} 1 ${n(x1)} ${n(y1)} Z" fill="${color}" stroke="#ffffff"/>`,
      );
    }

    const mid = share >= 1 ? -Math.PI / 2 : angle + sweep / 2;
    const lx = share >= 1 ? cx : cx + r * 0.6 * Math.cos(mid);
    const ly = share >= 1 ? cy : cy + r * 0.6 * Math.sin(mid);
    body.push(
      `<text x="${n(lx)}" y="${n(ly)}" text-anchor="middle" font-size="13">${escapeXml(entry.team)} ${formatShare(entry.commentCount, total)}</text>`,
    );

    angle += sweep;
  });

  return svgDocument(width, height, body);
}

/**
 * Bar chart of kept comments per team.
 */
export function renderBarChart(summary: TeamSummary[]): string {
  const width = 480;
  const height = 360;
  const left = 60;
  const right = 20;
  const top = 50;
  const bottom = 50;
  const plotWidth = width - left - right;
  const plotHeight = height - top - bottom;
  const baseline = top + plotHeight;
  const maxCount = Math.max(0, ...summary.map((s) => s.commentCount));
  const slot = summary.length > 0 ? plotWidth / summary.length : plotWidth;
  const barWidth = slot * 0.6;

  const body: string[] = [
    `<line x1="${left}" y1="${baseline}" x2="${width - right}" y2="${baseline}" stroke="#333333"/>`,
    `<line x1="${left}" y1="${top}" x2="${left}" y2="${baseline}" stroke="#333333"/>`,
    `<text x="16" y="${top + plotHeight / 2}" text-anchor="middle" font-size="13" transform="rotate(-90 16 ${top + plotHeight / 2})">Count</text>`,
  ];

  summary.forEach((entry, i) => {
    const barHeight = maxCount > 0 ? (entry.commentCount / maxCount) * plotHeight : 0;
    const x = left + i * slot + (slot - barWidth) / 2;
    const y = baseline - barHeight;
    body.push(
      `<rect x="${n(x)}" y="${n(y)}" width="${n(barWidth)}" height="${n(barHeight)}" fill="${colorAt(0)}"/>`,
      `<text x="${n(x + barWidth / 2)}" y="${n(y - 6)}" text-anchor="middle" font-size="12">${entry.commentCount}</text>`,
      `<text x="${n(x + barWidth / 2)}" y="${baseline + 20}" text-anchor="middle" font-size="13">${escapeXml(entry.team)}</text>`,
    );
  });

  return svgDocument(width, height, body);
}
