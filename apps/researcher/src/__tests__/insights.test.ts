import { describe, it, expect } from '@jest/globals';
import { aggregate } from '@traffic-vault/domain';
import { formatInsights, renderHeatmap } from '../insights.js';

/** Everything before the planning and privacy notes. */
const summaryOf = (text: string): string => text.split('\n\nInfrastructure planning')[0];

describe('formatInsights', () => {
  it('summarizes a congestion report', () => {
    const report = aggregate(
      [
        { lat: 40, lng: -74 },
        { lat: 40, lng: -74 },
        { lat: 41, lng: -73 },
      ],
      { gridSize: 2, hotspotRatio: 1 },
    );
    expect(summaryOf(formatInsights(report))).toBe(
      [
        'Total GPS points analyzed: 3',
        'Average location: 40.3333, -73.6667',
        'Grid bounds: lat 40.0000 .. 41.0000, lng -74.0000 .. -73.0000',
        'Congestion hotspots (1):',
        '  1. (40.2500, -73.7500) congestion level 2',
      ].join('\n'),
    );
  });

  it('groups thousands in the point total', () => {
    const points = Array.from({ length: 1200 }, () => ({ lat: 40.7, lng: -74 }));
    expect(formatInsights(aggregate(points)).split('\n')[0]).toBe('Total GPS points analyzed: 1,200');
  });

  it('handles an empty report', () => {
    expect(summaryOf(formatInsights(aggregate([])))).toBe(
      ['Total GPS points analyzed: 0', 'Average location: n/a', 'Congestion hotspots: none'].join('\n'),
    );
  });
});

describe('formatInsights closing notes', () => {
  it('ends with planning recommendations and privacy notes', () => {
    const lines = formatInsights(aggregate([{ lat: 40, lng: -74 }])).split('\n');
    expect(lines.slice(-9)).toEqual([
      '',
      'Infrastructure planning recommendations:',
      '  - Focus traffic improvements on the identified hotspots',
      '  - Consider additional public transport in congested areas',
      '  - Plan road maintenance around high-traffic corridors',
      '',
      'Privacy protection:',
      '  - Raw GPS coordinates never left the data domain',
      '  - Only the aggregate the owner approved was released',
    ]);
  });
});

describe('renderHeatmap', () => {
  it('puts north at the top', () => {
    expect(
      renderHeatmap([
        [3, 0],
        [0, 1],
      ]),
    ).toBe('.▒\n█.');
  });

  it('shades in quarters of the densest cell', () => {
    expect(renderHeatmap([[1, 2, 3, 4]])).toBe('░▒▓█');
  });

  it('renders an all-zero grid as dots', () => {
    expect(renderHeatmap([
      [0, 0],
      [0, 0],
    ])).toBe('..\n..');
  });
});
