/**
 * Three stacked panels (temperature, precipitation, wind) sharing the time axis,
 * one line per model. Drawn as SVG, rasterised to PNG with sharp.
 */
import sharp from 'sharp';
import type { AggregatedTable, Measure, ModelKey } from '@/types/forecast';
import { columnName, columnValues } from '@/services/forecast/table';

interface PanelSpec {
  measure: Measure;
  title: string;
  yLabel: string;
  marker: 'circle' | 'square' | 'triangle';
  dash?: string;
}

export const PANELS: readonly PanelSpec[] = [
  { measure: 'temperature', title: 'Temperature Forecast', yLabel: 'Temperature (°C)', marker: 'circle' },
  { measure: 'precipitation', title: 'Precipitation Forecast', yLabel: 'Precipitation (mm)', marker: 'square', dash: '8 4' },
  { measure: 'wind_speed', title: 'Wind Speed Forecast', yLabel: 'Wind Speed (km/h)', marker: 'triangle', dash: '8 4 2 4' },
];

// matplotlib "tab10"
const PALETTE = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd', '#8c564b', '#e377c2', '#7f7f7f', '#bcbd22', '#17becf'];

export interface ChartOptions {
  width?: number;
  panelHeight?: number;
}

const MARGIN = { top: 40, right: 180, bottom: 90, left: 80 };
const Y_TICKS = 5;

type Point = { x: number; y: number };

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Round number for axis labels; keeps at most two decimals. */
function tickLabel(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function yDomain(series: Array<Array<number | null>>): [number, number] {
  const values = series.flat().filter((v): v is number => v !== null && Number.isFinite(v));
  if (values.length === 0) return [0, 1];
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min === max) return [min - 1, max + 1];
  const pad = (max - min) * 0.1;
  return [min - pad, max + pad];
}

/** Consecutive non-null points; a null cell breaks the line. */
function segments(xs: number[], values: Array<number | null>, scaleY: (v: number) => number): Point[][] {
  const out: Point[][] = [];
  let current: Point[] = [];
  values.forEach((value, i) => {
    const x = xs[i];
    if (value === null || x === undefined) {
      if (current.length) out.push(current);
      current = [];
      return;
    }
    current.push({ x, y: scaleY(value) });
  });
  if (current.length) out.push(current);
  return out;
}

function marker(kind: PanelSpec['marker'], p: Point, color: string): string {
  const r = 4;
  switch (kind) {
    case 'square':
      return `<rect x="${p.x - r}" y="${p.y - r}" width="${2 * r}" height="${2 * r}" fill="${color}"/>`;
    case 'triangle':
      return `<polygon points="${p.x},${p.y - r} ${p.x - r},${p.y + r} ${p.x + r},${p.y + r}" fill="${color}"/>`;
    default:
      return `<circle cx="${p.x}" cy="${p.y}" r="${r}" fill="${color}"/>`;
  }
}

export function renderChartSvg(table: AggregatedTable, models: readonly ModelKey[], options: ChartOptions = {}): string {
  const width = options.width ?? 1400;
  const panelHeight = options.panelHeight ?? 320;
  const height = panelHeight * PANELS.length;
  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = panelHeight - MARGIN.top - MARGIN.bottom;

  const times = table.rows.map((row) => row.time.toMillis());
  const tMin = times.length ? Math.min(...times) : 0;
  const tMax = times.length ? Math.max(...times) : 0;
  const xs = times.map((t) =>
    tMax === tMin ? MARGIN.left + plotWidth / 2 : MARGIN.left + ((t - tMin) / (tMax - tMin)) * plotWidth,
  );
  const xLabels = table.rows.map((row) => row.time.toFormat('LL-dd HH:mm'));

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="DejaVu Sans, Arial, sans-serif">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
  ];

  PANELS.forEach((panel, index) => {
    const top = index * panelHeight + MARGIN.top;
    const bottom = top + plotHeight;
    const series = models.map((model) => columnValues(table, columnName(panel.measure, model)));
    const [yMin, yMax] = yDomain(series);
    const scaleY = (v: number) => bottom - ((v - yMin) / (yMax - yMin)) * plotHeight;

    parts.push(`<g class="panel" data-measure="${panel.measure}">`);
    parts.push(
      `<text x="${MARGIN.left + plotWidth / 2}" y="${top - 12}" text-anchor="middle" font-size="16">${escapeXml(panel.title)}</text>`,
    );
    parts.push(
      `<rect x="${MARGIN.left}" y="${top}" width="${plotWidth}" height="${plotHeight}" fill="none" stroke="#333333"/>`,
    );

    for (let i = 0; i <= Y_TICKS; i++) {
      const value = yMin + ((yMax - yMin) * i) / Y_TICKS;
      const y = scaleY(value);
      parts.push(`<line x1="${MARGIN.left - 5}" y1="${y}" x2="${MARGIN.left}" y2="${y}" stroke="#333333"/>`);
      parts.push(
        `<text x="${MARGIN.left - 8}" y="${y + 4}" text-anchor="end" font-size="11">${tickLabel(value)}</text>`,
      );
    }
    parts.push(
      `<text transform="translate(${MARGIN.left - 55},${top + plotHeight / 2}) rotate(-90)" text-anchor="middle" font-size="13">${escapeXml(panel.yLabel)}</text>`,
    );

    xs.forEach((x, i) => {
      parts.push(`<line x1="${x}" y1="${bottom}" x2="${x}" y2="${bottom + 5}" stroke="#333333"/>`);
      parts.push(
        `<text transform="translate(${x},${bottom + 14}) rotate(-45)" text-anchor="end" font-size="11">${escapeXml(xLabels[i] ?? '')}</text>`,
      );
    });

    models.forEach((model, m) => {
      const color = PALETTE[m % PALETTE.length] ?? '#000000';
      const values = series[m] ?? [];
      for (const segment of segments(xs, values, scaleY)) {
        const points = segment.map((p) => `${p.x},${p.y}`).join(' ');
        const dash = panel.dash ? ` stroke-dasharray="${panel.dash}"` : '';
        parts.push(
          `<polyline data-model="${escapeXml(model)}" points="${points}" fill="none" stroke="${color}" stroke-width="2"${dash}/>`,
        );
        parts.push(...segment.map((p) => marker(panel.marker, p, color)));
      }
    });

    const legendX = MARGIN.left + plotWidth + 20;
    parts.push(`<text x="${legendX}" y="${top + 14}" font-size="13" font-weight="bold">Models</text>`);
    models.forEach((model, m) => {
      const color = PALETTE[m % PALETTE.length] ?? '#000000';
      const y = top + 34 + m * 20;
      parts.push(`<line x1="${legendX}" y1="${y - 4}" x2="${legendX + 24}" y2="${y - 4}" stroke="${color}" stroke-width="2"/>`);
      parts.push(`<text x="${legendX + 30}" y="${y}" font-size="12">${escapeXml(model)}</text>`);
    });

    parts.push('</g>');
  });

  parts.push('</svg>');
  return parts.join('\n');
}

/** PNG rendering of {@link renderChartSvg}. */
export async function renderChart(
  table: AggregatedTable,
  models: readonly ModelKey[],
  options: ChartOptions = {},
): Promise<Buffer> {
  const svg = renderChartSvg(table, models, options);
  return sharp(Buffer.from(svg)).png().toBuffer();
}
