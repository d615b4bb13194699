import { OnboardingStageEnum } from '../../types/enums/onboardingStageEnum';
import { ActivityLevelEnum } from '../../types/enums/activityLevelEnum';
import { GoalEnum } from '../../types/enums/goalEnum';
import { SexEnum } from '../../types/enums/sexEnum';
import { newProfile } from '../profile/profileFields';
import {
  answerOnboarding,
  initialSession,
  reconcileOnboarding,
  resetOnboarding,
  startOnboarding,
} from './onboardingStateMachine';

const now = new Date('2024-03-01T08:00:00Z');

describe('onboarding state machine', () => {
  it('starts at the first question', () => {
    const { session, outcome } = startOnboarding(initialSession('u1', now), newProfile('u1', now), now);
    expect(outcome).toEqual({
      kind: 'prompt',
      stage: OnboardingStageEnum.AWAITING_SEX,
      progress: { current: 0, total: 5 },
      started: true,
    });
    expect(session.onboardingActive).toBe(true);
  });

  it('walks through every field and completes', () => {
    const profile = newProfile('u1', now);
    let session = startOnboarding(initialSession('u1', now), profile, now).session;
    const answers = ['Male', '30', '175', 'very active', 'cut'];
    const stages: OnboardingStageEnum[] = [];
    for (const answer of answers) {
      const t = answerOnboarding(session, profile, answer, now);
      session = t.session;
      if (t.outcome.kind === 'prompt') stages.push(t.outcome.stage);
      if (t.outcome.kind === 'completed') {
        expect(t.outcome.draft).toEqual({
          sex: SexEnum.MALE,
          age: 30,
          heightCm: 175,
          activityLevel: ActivityLevelEnum.VERY_ACTIVE,
          goal: GoalEnum.LOSE,
        });
        expect(t.outcome.progress).toEqual({ current: 5, total: 5 });
      }
    }
    expect(stages).toEqual([
      OnboardingStageEnum.AWAITING_AGE,
      OnboardingStageEnum.AWAITING_HEIGHT,
      OnboardingStageEnum.AWAITING_ACTIVITY,
      OnboardingStageEnum.AWAITING_GOAL,
    ]);
    expect(session.onboardingStage).toBe(OnboardingStageEnum.COMPLETE);
    expect(session.onboardingActive).toBe(false);
    expect(session.draft).toEqual({});
  });

  it('re-asks the same question after an invalid answer', () => {
    const profile = newProfile('u1', now);
    const started = startOnboarding(initialSession('u1', now), profile, now).session;
    const afterSex = answerOnboarding(started, profile, 'female', now).session;
    const t = answerOnboarding(afterSex, profile, 'abc', now);
    expect(t.session).toBe(afterSex);
    expect(t.outcome.kind).toBe('rejected');
    if (t.outcome.kind === 'rejected') {
      expect(t.outcome.stage).toBe(OnboardingStageEnum.AWAITING_AGE);
      expect(t.outcome.error.message).toBe('Age must be a whole number between 13 and 100.');
      expect(t.outcome.progress).toEqual({ current: 1, total: 5 });
    }
  });

  it('skips fields the profile already has', () => {
    const profile = { ...newProfile('u1', now), sex: SexEnum.FEMALE, age: 41 };
    const { outcome } = startOnboarding(initialSession('u1', now), profile, now);
    expect(outcome).toEqual({
      kind: 'prompt',
      stage: OnboardingStageEnum.AWAITING_HEIGHT,
      progress: { current: 2, total: 5 },
      started: true,
    });
  });

  it('resumes without restarting when start is sent again', () => {
    const profile = newProfile('u1', now);
    const first = startOnboarding(initialSession('u1', now), profile, now).session;
    const answered = answerOnboarding(first, profile, 'male', now).session;
    const { outcome } = startOnboarding(answered, profile, now);
    expect(outcome).toEqual({
      kind: 'prompt',
      stage: OnboardingStageEnum.AWAITING_AGE,
      progress: { current: 1, total: 5 },
      started: false,
    });
  });

  it('reports a complete profile', () => {
    const profile = {
      ...newProfile('u1', now),
      sex: SexEnum.MALE,
      age: 30,
      heightCm: 175,
      activityLevel: ActivityLevelEnum.ACTIVE,
      goal: GoalEnum.GAIN,
    };
    const { outcome } = startOnboarding(initialSession('u1', now), profile, now);
    expect(outcome).toEqual({ kind: 'already-complete', progress: { current: 5, total: 5 } });
  });

  it('replaces a collected answer with a field set outside onboarding', () => {
    const profile = newProfile('u1', now);
    const started = startOnboarding(initialSession('u1', now), profile, now).session;
    const answered = answerOnboarding(started, profile, 'male', now).session;
    const edited = { ...profile, sex: SexEnum.FEMALE };
    const t = reconcileOnboarding(answered, edited, { field: 'sex', value: SexEnum.FEMALE }, now);
    expect(t.session.draft).toEqual({ sex: SexEnum.FEMALE });
    expect(t.session.onboardingStage).toBe(OnboardingStageEnum.AWAITING_AGE);
    expect(t.outcome).toEqual({
      kind: 'prompt',
      stage: OnboardingStageEnum.AWAITING_AGE,
      progress: { current: 1, total: 5 },
      started: false,
    });
  });

  it('leaves the draft alone for fields onboarding does not ask', () => {
    const profile = newProfile('u1', now);
    const started = startOnboarding(initialSession('u1', now), profile, now).session;
    const t = reconcileOnboarding(started, { ...profile, weightKg: 82 }, { field: 'weightKg', value: 82 }, now);
    expect(t.session.draft).toEqual({});
    expect(t.session.onboardingStage).toBe(OnboardingStageEnum.AWAITING_SEX);
  });

  it('finishes when the edited field was the last one missing', () => {
    const profile = newProfile('u1', now);
    let session = startOnboarding(initialSession('u1', now), profile, now).session;
    for (const answer of ['male', '30', '175', 'active']) {
      session = answerOnboarding(session, profile, answer, now).session;
    }
    const t = reconcileOnboarding(session, { ...profile, goal: GoalEnum.GAIN }, { field: 'goal', value: GoalEnum.GAIN }, now);
    expect(t.outcome.kind).toBe('completed');
    if (t.outcome.kind === 'completed') {
      expect(t.outcome.draft.goal).toBe(GoalEnum.GAIN);
      expect(t.outcome.draft.sex).toBe(SexEnum.MALE);
    }
    expect(t.session.onboardingActive).toBe(false);
    expect(t.session.onboardingStage).toBe(OnboardingStageEnum.COMPLETE);
  });

  it('reset returns to the first stage with an empty draft', () => {
    const profile = newProfile('u1', now);
    const started = startOnboarding(initialSession('u1', now), profile, now).session;
    const answered = answerOnboarding(started, profile, 'male', now).session;
    expect(resetOnboarding(answered, now)).toEqual(initialSession('u1', now));
  });
});
