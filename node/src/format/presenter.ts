import type { AggregatedTable, ModelKey } from '@/types/forecast';
import type { PresentationConfig } from '@/config/types';
import { codeBlock, headRows, renderCsv, renderText } from './textTable';
import { renderChart } from './chart';

export const CSV_FILENAME = 'forecast.csv';
export const CSV_CAPTION = 'Forecast CSV';
export const CHART_FILENAME = 'forecast.png';

/** What the chat should receive for the table part of a forecast. */
export type TableReply =
  | { kind: 'inline'; text: string }
  | { kind: 'file'; filename: string; caption: string; csv: string; preview: string };

/**
 * Up to `previewRows` leading rows, fewer if the fenced preview would not fit
 * in `textLimit`. The header line is always kept.
 */
export function renderPreview(table: AggregatedTable, config: PresentationConfig): string {
  let count = Math.min(config.previewRows, table.rows.length);
  let preview = renderText(headRows(table, count));
  while (count > 0 && codeBlock(preview).length > config.textLimit) {
    count -= 1;
    preview = renderText(headRows(table, count));
  }
  return preview;
}

/**
 * Small tables go out inline. Anything longer than `textLimit` goes out as a
 * CSV document plus a preview of the leading rows.
 */
export function planTableReply(table: AggregatedTable, config: PresentationConfig): TableReply {
  const text = renderText(table);
  if (text.length <= config.textLimit) {
    return { kind: 'inline', text };
  }
  return {
    kind: 'file',
    filename: CSV_FILENAME,
    caption: CSV_CAPTION,
    csv: renderCsv(table),
    preview: renderPreview(table, config),
  };
}

export interface ForecastPresenter {
  planTable(table: AggregatedTable): TableReply;
  renderChart(table: AggregatedTable, models: readonly ModelKey[]): Promise<Buffer>;
}

export class Presenter implements ForecastPresenter {
  constructor(private readonly config: PresentationConfig) {}

  planTable(table: AggregatedTable): TableReply {
    return planTableReply(table, this.config);
  }

  renderChart(table: AggregatedTable, models: readonly ModelKey[]): Promise<Buffer> {
    return renderChart(table, models);
  }
}
