import { WeightLogInterface } from '../../types/WeightLogInterface';
import { TrendEnum } from '../../types/enums/trendEnum';
import { summarizeHistory, summarizeWindow, trendOf } from './trendSummarizer';

const now = new Date('2024-03-15T12:00:00Z');
const daysAgo = (d: number) => new Date(now.getTime() - d * 24 * 3600 * 1000);
const entry = (d: number, valueKg: number): WeightLogInterface => ({ userId: 'u1', timestampUtc: daysAgo(d), valueKg });

describe('trendOf', () => {
  it('treats changes within the noise threshold as flat', () => {
    expect(trendOf(0.3, 0.3)).toBe(TrendEnum.FLAT);
    expect(trendOf(-0.3, 0.3)).toBe(TrendEnum.FLAT);
    expect(trendOf(0.31, 0.3)).toBe(TrendEnum.UP);
    expect(trendOf(-0.5, 0.3)).toBe(TrendEnum.DOWN);
  });
});

describe('summarizeWindow', () => {
  it('summarises entries regardless of input order', () => {
    const summary = summarizeWindow([entry(2, 69), entry(0, 68), entry(4, 70)], 7, now);
    expect(summary).toEqual({
      windowDays: 7,
      status: 'ok',
      averageKg: 69,
      deltaKg: -2,
      trend: TrendEnum.DOWN,
      sampleCount: 3,
      from: daysAgo(4),
      to: daysAgo(0),
    });
  });

  it('reports insufficient data below two entries', () => {
    const summary = summarizeWindow([entry(1, 70)], 7, now);
    expect(summary.status).toBe('insufficient-data');
    expect(summary.averageKg).toBeNull();
    expect(summary.deltaKg).toBeNull();
    expect(summary.sampleCount).toBe(1);
  });

  it('ignores entries outside the window', () => {
    const summary = summarizeWindow([entry(10, 75), entry(3, 70), entry(1, 70.2)], 7, now);
    expect(summary.sampleCount).toBe(2);
    expect(summary.deltaKg).toBe(0.2);
    expect(summary.trend).toBe(TrendEnum.FLAT);
  });
});

describe('summarizeHistory', () => {
  it('returns the 7 and 30 day windows', () => {
    const entries = [entry(20, 74), entry(5, 72), entry(1, 71)];
    const [week, month] = summarizeHistory(entries, now);
    expect(week.windowDays).toBe(7);
    expect(week.sampleCount).toBe(2);
    expect(week.deltaKg).toBe(-1);
    expect(month.windowDays).toBe(30);
    expect(month.sampleCount).toBe(3);
    expect(month.deltaKg).toBe(-3);
    expect(month.averageKg).toBe(72.33);
  });

  it('does not change when called twice', () => {
    const entries = [entry(3, 70), entry(1, 70.5)];
    expect(summarizeHistory(entries, now)).toEqual(summarizeHistory(entries, now));
  });
});
