import type { CongestionAnalysis, CongestionGrid } from '@traffic-vault/domain';

const SHADES = ['░', '▒', '▓', '█'];

const coord = (value: number): string => value.toFixed(4);

const CLOSING_NOTES = [
  'Infrastructure planning recommendations:',
  '  - Focus traffic improvements on the identified hotspots',
  '  - Consider additional public transport in congested areas',
  '  - Plan road maintenance around high-traffic corridors',
  '',
  'Privacy protection:',
  '  - Raw GPS coordinates never left the data domain',
  '  - Only the aggregate the owner approved was released',
];

export function formatInsights(report: CongestionAnalysis): string {
  const lines = [`Total GPS points analyzed: ${report.totalGpsPoints.toLocaleString('en-US')}`];

  lines.push(
    report.averageLocation
      ? `Average location: ${coord(report.averageLocation.lat)}, ${coord(report.averageLocation.lng)}`
      : 'Average location: n/a',
  );

  if (report.gridBounds) {
    const b = report.gridBounds;
    lines.push(`Grid bounds: lat ${coord(b.latMin)} .. ${coord(b.latMax)}, lng ${coord(b.lngMin)} .. ${coord(b.lngMax)}`);
  }

  if (report.hotspots.length === 0) {
    lines.push('Congestion hotspots: none');
  } else {
    lines.push(`Congestion hotspots (${report.hotspots.length}):`);
    report.hotspots.forEach((h, i) => {
      lines.push(`  ${i + 1}. (${coord(h.lat)}, ${coord(h.lng)}) congestion level ${h.congestionLevel}`);
    });
  }

  lines.push('', ...CLOSING_NOTES);
  return lines.join('\n');
}

/**
 * One character per cell, north at the top. Empty cells are `.`, the rest
 * are shaded in quarters of the densest cell.
 */
export function renderHeatmap(grid: CongestionGrid): string {
  const max = Math.max(0, ...grid.flat());
  return [...grid]
    .reverse()
    .map((row) =>
      row
        .map((count) => (count === 0 || max === 0 ? '.' : SHADES[Math.max(0, Math.ceil((count / max) * 4) - 1)]))
        .join(''),
    )
    .join('\n');
}
