import fs from 'fs';
import path from 'path';
import { BacktestResult, ChartData, ChartPoint, CrossoverMarker } from './types';

function markerFor(positionChange: number): CrossoverMarker | undefined {
  if (positionChange > 0) return 'buy';
  if (positionChange < 0) return 'sell';
  return undefined;
}

/**
 * Project a completed run onto what a price/equity chart needs: price with both averages,
 * crossover markers, the strategy curve and a buy-and-hold curve over the same rows.
 */
export function buildChartData(result: BacktestResult): ChartData {
  let holdWealth = 1;
  const points = result.rows.map((r): ChartPoint => {
    holdWealth *= 1 + r.priceReturn;
    const marker = markerFor(r.positionChange);
    return {
      timestamp: r.timestamp,
      price: r.price,
      shortMa: r.shortMa,
      longMa: r.longMa,
      signal: r.signal,
      cumulativeReturn: r.cumulativeReturn,
      buyHoldReturn: holdWealth - 1,
      ...(marker && { marker }),
    };
  });

  return {
    shortWindow: result.params.shortWindow,
    longWindow: result.params.longWindow,
    points,
  };
}

const CSV_HEADER = 'timestamp,date,price,shortMa,longMa,signal,marker,cumulativeReturn,buyHoldReturn';

export function chartDataToCsv(chart: ChartData): string {
  const lines = [CSV_HEADER];
  for (const p of chart.points) {
    lines.push([
      p.timestamp,
      new Date(p.timestamp).toISOString().split('T')[0],
      p.price,
      p.shortMa,
      p.longMa,
      p.signal,
      p.marker ?? '',
      p.cumulativeReturn,
      p.buyHoldReturn,
    ].join(','));
  }
  return lines.join('\n') + '\n';
}

/** Write chart data for an external plotting tool. `.json` writes JSON, anything else CSV. */
export function exportChartData(chart: ChartData, filePath: string): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });

  const body = path.extname(resolved).toLowerCase() === '.json'
    ? JSON.stringify(chart, null, 2) + '\n'
    : chartDataToCsv(chart);
  fs.writeFileSync(resolved, body);
  return resolved;
}
