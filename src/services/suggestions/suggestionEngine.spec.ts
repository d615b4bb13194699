import { CoachProfileInterface } from '../../types/ProfileInterface';
import { WeightLogInterface } from '../../types/WeightLogInterface';
import { ActivityLevelEnum } from '../../types/enums/activityLevelEnum';
import { GoalEnum } from '../../types/enums/goalEnum';
import { SexEnum } from '../../types/enums/sexEnum';
import { SuggestionKindEnum } from '../../types/enums/suggestionKindEnum';
import { calculatePlan } from '../planRules/nutrition';
import { newProfile } from '../profile/profileFields';
import { slopeKgPerDay, suggestAfterLog, trailingStreak } from './suggestionEngine';

const start = new Date('2024-03-01T07:00:00Z');
const at = (day: number, valueKg: number): WeightLogInterface => ({
  userId: 'u1',
  timestampUtc: new Date(start.getTime() + day * 24 * 3600 * 1000),
  valueKg,
});

const profile = (fields: Partial<CoachProfileInterface>): CoachProfileInterface => ({
  ...newProfile('u1', start),
  sex: SexEnum.MALE,
  age: 30,
  heightCm: 175,
  activityLevel: ActivityLevelEnum.ACTIVE,
  goal: GoalEnum.LOSE,
  ...fields,
});

// target 2172, floor 1649
const cutPlan = calculatePlan(profile({}));

describe('slopeKgPerDay', () => {
  it('fits a straight line through the samples', () => {
    expect(slopeKgPerDay([at(0, 80), at(7, 78)])).toBeCloseTo(-2 / 7, 10);
    expect(slopeKgPerDay([at(0, 80)])).toBe(0);
  });
});

describe('trailingStreak', () => {
  it('counts consecutive steps in one direction from the end', () => {
    const samples = [at(0, 80), at(1, 81), at(2, 80.5), at(3, 80.2), at(4, 80.1)];
    expect(trailingStreak(samples, -1)).toBe(3);
    expect(trailingStreak(samples, 1)).toBe(0);
  });
});

describe('suggestAfterLog', () => {
  it('asks for more data with a single weigh-in', () => {
    const s = suggestAfterLog({ plan: cutPlan, goal: GoalEnum.LOSE, history: [], observation: at(0, 80) });
    expect(s).toEqual({
      kind: SuggestionKindEnum.INSUFFICIENT_DATA,
      reason: 'not-enough-data',
      action: 'none',
      deltaKcal: 0,
      suggestedTargetKcal: 2172,
      weeklyRateKg: null,
      sampleCount: 1,
    });
  });

  it('ignores history older than the lookback window', () => {
    const s = suggestAfterLog({ plan: cutPlan, goal: GoalEnum.LOSE, history: [at(0, 82)], observation: at(20, 80) });
    expect(s.kind).toBe(SuggestionKindEnum.INSUFFICIENT_DATA);
    expect(s.sampleCount).toBe(1);
  });

  it('reinforces a steady loss', () => {
    const s = suggestAfterLog({ plan: cutPlan, goal: GoalEnum.LOSE, history: [at(0, 80)], observation: at(7, 79.5) });
    expect(s.kind).toBe(SuggestionKindEnum.REINFORCE);
    expect(s.reason).toBe('on-track');
    expect(s.weeklyRateKg).toBe(-0.5);
    expect(s.deltaKcal).toBe(0);
    expect(s.suggestedTargetKcal).toBe(2172);
  });

  it('lowers the target when weight keeps rising on a cut', () => {
    const s = suggestAfterLog({
      plan: cutPlan,
      goal: GoalEnum.LOSE,
      history: [at(0, 80), at(2, 80.4)],
      observation: at(4, 80.8),
    });
    expect(s).toEqual({
      kind: SuggestionKindEnum.ADJUST_DOWN,
      reason: 'gaining-against-goal',
      action: 'calories',
      deltaKcal: -100,
      suggestedTargetKcal: 2072,
      weeklyRateKg: 1.4,
      sampleCount: 3,
    });
  });

  it('does not react to a single upward step', () => {
    const s = suggestAfterLog({
      plan: cutPlan,
      goal: GoalEnum.LOSE,
      history: [at(0, 80), at(2, 79)],
      observation: at(4, 80.2),
    });
    expect(s.kind).toBe(SuggestionKindEnum.REINFORCE);
    expect(s.reason).toBe('trend-unconfirmed');
    expect(s.weeklyRateKg).toBe(0.35);
    expect(s.deltaKcal).toBe(0);
  });

  it('holds the target when two weigh-ins move against the goal', () => {
    const s = suggestAfterLog({ plan: cutPlan, goal: GoalEnum.LOSE, history: [at(0, 80)], observation: at(7, 80.5) });
    expect(s).toEqual({
      kind: SuggestionKindEnum.REINFORCE,
      reason: 'trend-unconfirmed',
      action: 'none',
      deltaKcal: 0,
      suggestedTargetKcal: 2172,
      weeklyRateKg: 0.5,
      sampleCount: 2,
    });
  });

  it('raises the target when the loss is too fast', () => {
    const s = suggestAfterLog({ plan: cutPlan, goal: GoalEnum.LOSE, history: [at(0, 80)], observation: at(7, 78) });
    expect(s.kind).toBe(SuggestionKindEnum.ADJUST_UP);
    expect(s.reason).toBe('loss-too-fast');
    expect(s.deltaKcal).toBe(100);
    expect(s.suggestedTargetKcal).toBe(2272);
    expect(s.weeklyRateKg).toBe(-2);
  });

  it('lowers the target when a gain is too fast', () => {
    const s = suggestAfterLog({ plan: cutPlan, goal: GoalEnum.GAIN, history: [at(0, 70)], observation: at(7, 71) });
    expect(s.kind).toBe(SuggestionKindEnum.ADJUST_DOWN);
    expect(s.reason).toBe('gain-too-fast');
    expect(s.weeklyRateKg).toBe(1);
  });

  it('raises the target when maintenance drifts down', () => {
    const s = suggestAfterLog({
      plan: cutPlan,
      goal: GoalEnum.MAINTAIN,
      history: [at(0, 75), at(3, 74.6)],
      observation: at(6, 74.2),
    });
    expect(s.kind).toBe(SuggestionKindEnum.ADJUST_UP);
    expect(s.reason).toBe('drifting-down');
    expect(s.weeklyRateKg).toBe(-0.93);
  });

  it('suggests activity instead of eating below the safety floor', () => {
    const floorPlan = calculatePlan(
      profile({ sex: SexEnum.FEMALE, age: 60, heightCm: 150, activityLevel: ActivityLevelEnum.SEDENTARY, weightKg: 45 })
    );
    expect(floorPlan.targetKcal).toBe(floorPlan.floorKcal);

    const s = suggestAfterLog({
      plan: floorPlan,
      goal: GoalEnum.LOSE,
      history: [at(0, 45), at(2, 45.4)],
      observation: at(4, 45.8),
    });
    expect(s).toEqual({
      kind: SuggestionKindEnum.ADJUST_DOWN,
      reason: 'gaining-against-goal',
      action: 'activity',
      deltaKcal: 0,
      suggestedTargetKcal: 1200,
      weeklyRateKg: 1.4,
      sampleCount: 3,
      activityStepsPerDay: 2000,
    });
  });
});
