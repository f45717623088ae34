import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { escapeXml, renderChart, renderChartSvg } from '@/format/chart';
import { outerJoin, toModelTable } from '@/services/forecast/table';
import { observationsAt } from './helpers';

const gfs = toModelTable('GFS', observationsAt(['2025-08-19T12:00', '2025-08-19T13:00', '2025-08-19T14:00'], 'Asia/Kolkata'));
const icon = toModelTable(
  'ICON',
  observationsAt(['2025-08-19T12:00', '2025-08-19T13:00', '2025-08-19T14:00'], 'Asia/Kolkata', (i) => (i === 1 ? null : 30)),
);
const table = outerJoin(gfs, icon);

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('renderChartSvg', () => {
  const svg = renderChartSvg(table, ['GFS', 'ICON']);

  it('draws the three panels with their titles and units', () => {
    expect(count(svg, '<g class="panel"')).toBe(3);
    expect(svg).toContain('>Temperature Forecast<');
    expect(svg).toContain('>Precipitation (mm)<');
    expect(svg).toContain('>Wind Speed (km/h)<');
  });

  it('lists the models in each panel legend', () => {
    expect(count(svg, '>Models<')).toBe(3);
    expect(count(svg, '>GFS</text>')).toBe(3);
    expect(count(svg, '>ICON</text>')).toBe(3);
  });

  it('draws one line per model per panel and breaks lines at gaps', () => {
    // GFS is continuous; ICON has a gap in the middle so each panel gets two single-point segments.
    expect(count(svg, '<polyline data-model="GFS"')).toBe(3);
    expect(count(svg, '<polyline data-model="ICON"')).toBe(6);
  });

  it('rotates the time labels', () => {
    expect(count(svg, 'rotate(-45)')).toBe(3 * table.rows.length);
    expect(svg).toContain('>08-19 13:00<');
  });

  it('escapes text it does not control', () => {
    expect(escapeXml('A&B <C>')).toBe('A&amp;B &lt;C&gt;');
  });
});

describe('renderChart', () => {
  it('rasterises to a PNG of the chart size', async () => {
    const png = await renderChart(table, ['GFS', 'ICON'], { width: 700, panelHeight: 240 });

    expect(png.subarray(0, 4).toString('hex')).toBe('89504e47');
    const meta = await sharp(png).metadata();
    expect(meta.format).toBe('png');
    expect(meta.width).toBe(700);
    expect(meta.height).toBe(720);
  });
});
