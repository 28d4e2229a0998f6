import { defaultConfig } from '../src/config';
import { decide, evaluate, warningSummary } from '../src/decision';
import { PolicyError } from '../src/errors';
import { configuredWarningAction, resolvePolicy } from '../src/policy';
import { ReportBuilder, VerificationReport } from '../src/report';
import { makeTarget } from '../src/target';
import { OnWarning, Policy, Severity } from '../src/types';

const target = makeTarget('PyPI', 'requests', '2.32.3');

function reportWith(...severities: Severity[]): VerificationReport {
  const builder = new ReportBuilder().ranVerifier('test');
  severities.forEach((severity, i) => builder.addFinding({ target, severity, message: `finding ${i}`, verifier: 'test' }));
  return builder.build();
}

function policy(overrides: Partial<Policy> = {}): Policy {
  return { interactive: false, errorOnBlock: false, dryRun: false, allowUnsupported: false, ...overrides };
}

describe('Decision engine', () => {
  describe('evaluate', () => {
    const combos: { interactive: boolean; onWarning?: OnWarning }[] = [
      { interactive: false },
      { interactive: true },
      { interactive: false, onWarning: 'allow' },
      { interactive: true, onWarning: 'allow' },
      { interactive: false, onWarning: 'block' },
      { interactive: true, onWarning: 'block' },
    ];

    test.each(combos)('a critical finding blocks under %o', (combo) => {
      expect(evaluate(reportWith('critical', 'warning'), policy(combo))).toBe('block');
    });

    test('warnings follow the configured action', () => {
      expect(evaluate(reportWith('warning'), policy({ onWarning: 'allow' }))).toBe('allow');
      expect(evaluate(reportWith('warning'), policy({ onWarning: 'block', interactive: true }))).toBe('block');
    });

    test('warnings prompt when interactive and abort otherwise', () => {
      expect(evaluate(reportWith('warning'), policy({ interactive: true }))).toBe('prompt');
      expect(evaluate(reportWith('warning'), policy())).toBe('abort');
    });

    test('a clean report allows', () => {
      expect(evaluate(reportWith(), policy())).toBe('allow');
    });
  });

  describe('decide', () => {
    test('asks once and allows on yes', async () => {
      const prompter = jest.fn().mockResolvedValue(true);
      const decision = await decide(reportWith('warning'), policy({ interactive: true }), prompter);
      expect(decision).toMatchObject({ action: 'allow', prompted: true });
      expect(prompter).toHaveBeenCalledTimes(1);
      expect(prompter.mock.calls[0][0]).toBe(
        ['Verifiers raised 1 warning(s):', '  - requests@2.32.3: finding 0', 'Proceed with installation?'].join('\n'),
      );
    });

    test('declining aborts', async () => {
      const decision = await decide(reportWith('warning'), policy({ interactive: true }), async () => false);
      expect(decision.action).toBe('abort');
    });

    test('never asks when no prompt is needed', async () => {
      const prompter = jest.fn();
      const decision = await decide(reportWith('critical'), policy({ interactive: true }), prompter);
      expect(decision).toMatchObject({ action: 'block', prompted: false });
      expect(prompter).not.toHaveBeenCalled();
    });
  });

  test('warningSummary lists only warnings', () => {
    expect(warningSummary(reportWith('critical'))).toBe('Verifiers raised 0 warning(s):\nProceed with installation?');
  });

  describe('resolvePolicy', () => {
    test('rejects allow-on-warning together with block-on-warning', () => {
      expect(() =>
        resolvePolicy({
          flags: { allowOnWarning: true, blockOnWarning: true },
          config: defaultConfig,
          env: {},
          interactive: true,
        }),
      ).toThrow(PolicyError);
    });

    test('flags beat the environment, which beats the configuration file', () => {
      const config = { ...defaultConfig, onWarning: 'allow' as const };
      const env = { WARDEN_ON_WARNING: 'block' };
      expect(resolvePolicy({ flags: {}, config, env: {}, interactive: true }).onWarning).toBe('allow');
      expect(resolvePolicy({ flags: {}, config, env, interactive: true }).onWarning).toBe('block');
      expect(resolvePolicy({ flags: { allowOnWarning: true }, config, env, interactive: true }).onWarning).toBe('allow');
    });

    test('without any warning action the policy prompts', () => {
      const resolved = resolvePolicy({ flags: {}, config: defaultConfig, env: {}, interactive: true });
      expect(resolved).toEqual({
        interactive: true,
        errorOnBlock: false,
        dryRun: false,
        allowUnsupported: false,
      });
      expect(evaluate(reportWith('warning'), resolved)).toBe('prompt');
    });

    test('outside a run the environment still beats the configuration file', () => {
      const config = { ...defaultConfig, onWarning: 'allow' as const };
      expect(configuredWarningAction(config, { WARDEN_ON_WARNING: 'block' })).toBe('block');
      expect(configuredWarningAction(config, {})).toBe('allow');
      expect(configuredWarningAction(defaultConfig, {})).toBeUndefined();
    });

    test('rejects an invalid environment value', () => {
      expect(() =>
        resolvePolicy({ flags: {}, config: defaultConfig, env: { WARDEN_ON_WARNING: 'maybe' }, interactive: false }),
      ).toThrow("Invalid WARDEN_ON_WARNING value 'maybe': expected 'allow' or 'block'");
    });
  });
});
