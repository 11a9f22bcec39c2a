import { describe, it, expect, vi } from 'vitest';
import type { Page } from 'playwright';
import {
  InputActuator,
  NativeStrategy,
  SimulatedInputStrategy,
  DomInjectionStrategy,
  defaultStrategies,
  type ActuatorStrategy,
} from '../../src/core/input-actuator.js';
import { FakePage } from '../helpers/fake-page.js';

describe('InputActuator', () => {
  describe('fill', () => {
    it('should stop at the native technique when the value reads back', async () => {
      const page = new FakePage();
      page.add('#email');
      const actuator = new InputActuator();

      const result = await actuator.attemptDetailed(page.asPage(), '#email', 'user@example.com');

      expect(result).toEqual({
        succeeded: true,
        technique: 'native',
        outcomes: [{ technique: 'native', succeeded: true }],
      });
      expect(page.get('#email').value).toBe('user@example.com');
      expect(page.actions).not.toContain('inject #email');
    });

    it('should escalate native mismatch -> simulated failure -> dom injection', async () => {
      const page = new FakePage();
      page.add('#email', { fill: 'garbled', keys: 'throws', injection: 'ok' });
      const actuator = new InputActuator();

      const result = await actuator.attemptDetailed(page.asPage(), '#email', 'user@example.com');

      expect(result.succeeded).toBe(true);
      expect(result.technique).toBe('dom-injection');
      expect(result.outcomes).toEqual([
        { technique: 'native', succeeded: false },
        { technique: 'simulated', succeeded: false },
        { technique: 'dom-injection', succeeded: true },
      ]);
      expect(page.get('#email').value).toBe('user@example.com');
    });

    it('should use simulated typing when the native fill is ignored', async () => {
      const page = new FakePage();
      page.add('#password', { fill: 'ignored', value: 'stale' });
      const actuator = new InputActuator();

      const result = await actuator.attemptDetailed(page.asPage(), '#password', 'test-secret');

      expect(result.technique).toBe('simulated');
      expect(page.get('#password').value).toBe('test-secret');
      expect(page.keyboard.press).toHaveBeenCalledWith('ControlOrMeta+A');
      expect(page.keyboard.press).toHaveBeenCalledWith('Backspace');
      expect(page.keyboard.type).toHaveBeenCalledWith('test-secret', { delay: 50 });
    });

    it('should resolve false when every technique fails', async () => {
      const page = new FakePage();
      page.add('#code', { fill: 'throws', keys: 'ignored', injection: 'ignored' });
      const actuator = new InputActuator();

      const result = await actuator.attemptDetailed(page.asPage(), '#code', '123456');

      expect(result.succeeded).toBe(false);
      expect(result.technique).toBeUndefined();
      expect(result.outcomes.map((o) => o.succeeded)).toEqual([false, false, false]);
    });

    it('should resolve false for a selector that matches nothing', async () => {
      const page = new FakePage();
      const actuator = new InputActuator();

      await expect(actuator.attempt(page.asPage(), '#missing', 'x')).resolves.toBe(false);
    });

    it('should reject an injected value that does not read back', async () => {
      const page = new FakePage();
      page.add('#email', { fill: 'throws', keys: 'ignored', injection: 'garbled' });

      const ok = await new InputActuator().attempt(page.asPage(), '#email', 'user@example.com');

      expect(ok).toBe(false);
      expect(page.get('#email').value).toBe('user@example.co');
    });
  });

  describe('click', () => {
    it('should click natively when possible', async () => {
      const page = new FakePage();
      page.add('#submit');

      const result = await new InputActuator().attemptDetailed(page.asPage(), '#submit');

      expect(result.technique).toBe('native');
      expect(page.get('#submit').clicks).toBe(1);
    });

    it('should fall back to a script click when pointer clicks are intercepted', async () => {
      const page = new FakePage();
      page.add('#submit', { click: 'throws' });

      const result = await new InputActuator().attemptDetailed(page.asPage(), '#submit');

      expect(result.outcomes).toEqual([
        { technique: 'native', succeeded: false },
        { technique: 'simulated', succeeded: false },
        { technique: 'dom-injection', succeeded: true },
      ]);
      expect(page.actions).toContain('script-click #submit');
    });

    it('should fail the simulated click for an element without a box', async () => {
      const page = new FakePage();
      page.add('#hidden', { visible: false });

      const ok = await new SimulatedInputStrategy().tryAct(page.asPage(), { selector: '#hidden' });

      expect(ok).toBe(false);
      expect(page.mouse.click).not.toHaveBeenCalled();
    });
  });

  describe('strategy chain', () => {
    it('should build native, simulated, dom-injection in that order', () => {
      const chain = defaultStrategies();
      expect(chain.map((s) => s.technique)).toEqual(['native', 'simulated', 'dom-injection']);
      expect(chain[0]).toBeInstanceOf(NativeStrategy);
      expect(chain[2]).toBeInstanceOf(DomInjectionStrategy);
    });

    it('should call each strategy once, in order, until one succeeds', async () => {
      const calls: string[] = [];
      const strategy = (technique: ActuatorStrategy['technique'], outcome: boolean | Error): ActuatorStrategy => ({
        technique,
        tryAct: vi.fn(async () => {
          calls.push(technique);
          if (outcome instanceof Error) throw outcome;
          return outcome;
        }),
      });
      const last = strategy('dom-injection', true);
      const actuator = new InputActuator([
        strategy('native', new Error('SyntaxError: not a selector')),
        strategy('simulated', true),
        last,
      ]);

      const ok = await actuator.attempt(new FakePage().asPage(), 'div >>> bad', 'v');

      expect(ok).toBe(true);
      expect(calls).toEqual(['native', 'simulated']);
      expect(last.tryAct).not.toHaveBeenCalled();
    });

    it('should pass the target through to strategies', async () => {
      const tryAct = vi.fn(async (_page: Page, _target: { selector: string; value?: string }) => true);
      const actuator = new InputActuator([{ technique: 'native', tryAct }]);
      const page = new FakePage().asPage();

      await actuator.attempt(page, '#q', 'hello');

      expect(tryAct).toHaveBeenCalledWith(page, { selector: '#q', value: 'hello' });
    });
  });
});
