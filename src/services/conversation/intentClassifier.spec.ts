import { UnrecognizedIntentError } from '../../utils/errors';
import { LOG_USAGE, PROFILE_SET_USAGE, classifyIntent, parseCommand } from './intentClassifier';

const idle = { onboardingActive: false };

describe('classifyIntent', () => {
  it.each([
    ['start', 'start'],
    ['PLAN', 'plan'],
    ['  history ', 'history'],
    ['profile', 'profile-show'],
    ['profile show', 'profile-show'],
    ['guide', 'guide'],
    ['reset', 'reset'],
    ['Help', 'help'],
  ])('maps %j to %s', (text, kind) => {
    expect(classifyIntent(text, idle).kind).toBe(kind);
  });

  it('parses a weight to log', () => {
    expect(classifyIntent('log 72.5', idle)).toEqual({ kind: 'log', valueKg: 72.5 });
  });

  it('flags a malformed log with the usage hint', () => {
    const intent = classifyIntent('log abc', idle);
    expect(intent.kind).toBe('malformed');
    if (intent.kind === 'malformed') {
      expect(intent.command).toBe('log');
      expect(intent.error.message).toBe(
        `Weight must be a number of kilograms between 0 and 400, e.g. 72.5. ${LOG_USAGE}`
      );
    }
  });

  it('rejects zero and out of range weights', () => {
    expect(classifyIntent('log 0', idle).kind).toBe('malformed');
    expect(classifyIntent('log 400', idle).kind).toBe('malformed');
    expect(classifyIntent('log 399.9', idle)).toEqual({ kind: 'log', valueKg: 399.9 });
  });

  it('needs exactly one value after log', () => {
    const intent = classifyIntent('log', idle);
    expect(intent.kind === 'malformed' && intent.error.message).toBe(LOG_USAGE);
  });

  it('maps profile set keys to fields', () => {
    expect(classifyIntent('profile set activity very active', idle)).toEqual({
      kind: 'profile-set',
      field: 'activityLevel',
      rawValue: 'very active',
    });
    expect(classifyIntent('profile set goal_weight none', idle)).toEqual({
      kind: 'profile-set',
      field: 'goalWeightKg',
      rawValue: 'none',
    });
  });

  it('rejects unknown profile keys', () => {
    const intent = classifyIntent('profile set constructor 1', idle);
    expect(intent.kind === 'malformed' && intent.error.message).toBe(PROFILE_SET_USAGE);
  });

  it('treats free text as an onboarding answer only while onboarding', () => {
    expect(classifyIntent('Male', { onboardingActive: true })).toEqual({ kind: 'onboarding-answer', text: 'Male' });
    expect(classifyIntent('Male', idle)).toEqual({ kind: 'unrecognized' });
  });

  it('keeps commands working during onboarding', () => {
    expect(classifyIntent('help', { onboardingActive: true })).toEqual({ kind: 'help' });
  });
});

describe('parseCommand', () => {
  it('throws for text that is not a command', () => {
    expect(() => parseCommand('hello there')).toThrow(UnrecognizedIntentError);
  });
});
