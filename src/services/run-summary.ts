import { RunStatus } from '../types/common/enums';
import { IngestionRunResult } from '../types/models/ingestion';

/**
 * Human-readable report printed at the end of a run
 */
export function formatRunSummary(result: IngestionRunResult): string {
  const lines: string[] = [];

  if (result.status === RunStatus.SUCCESS) {
    lines.push('SUCCESS: stock and weather data loaded');
  } else {
    lines.push(`FAILED at ${result.stage}: ${result.error?.message ?? 'unknown error'}`);
  }

  lines.push(`  Stock records:   ${result.stockRecords.accepted} valid, ${result.stockRecords.skipped} skipped, ${result.stockUpserted} upserted`);
  lines.push(`  Weather records: ${result.weatherRecords.accepted} valid, ${result.weatherRecords.skipped} skipped, ${result.weatherUpserted} upserted`);

  const verification = result.verification;
  if (verification) {
    for (const table of [verification.stock, verification.weather]) {
      lines.push(
        `  ${table.table}: ${table.totalCount} rows (${table.earliestDate ?? 'n/a'} to ${table.latestDate ?? 'n/a'})`
      );
    }
    if (verification.latestStock) {
      const { date, closePrice, volume } = verification.latestStock;
      lines.push(`  Latest close: ${date ?? 'n/a'} $${closePrice.toFixed(2)}, volume ${volume}`);
    }
  }

  lines.push(`  Duration: ${result.durationMs}ms`);
  return lines.join('\n');
}
