import { describe, it, expect, afterEach, vi } from 'vitest';
import { OtpHandler, GENERIC_OTP_TARGET } from '../../src/core/otp-handler.js';
import { inputsHoldCode } from '../../src/core/page-scripts.js';
import { FakePage } from '../helpers/fake-page.js';
import { createScriptedOperator } from '../helpers/fake-operator.js';

describe('OtpHandler', () => {
  it('should paste without focus when the page listens for document-level paste', async () => {
    const page = new FakePage();
    page.documentPasteTarget = page.add('#otp');
    const handler = new OtpHandler(createScriptedOperator());

    const result = await handler.submitOtpDetailed(page.asPage(), '#otp', '123456');

    expect(result).toEqual({
      succeeded: true,
      technique: 'global-paste',
      outcomes: [{ technique: 'global-paste', succeeded: true }],
    });
    expect(page.contextStub.grantPermissions).toHaveBeenCalledWith(['clipboard-read', 'clipboard-write']);
    expect(page.clipboard).toBe('123456');
  });

  it('should focus the input and paste when the unfocused paste lands nowhere', async () => {
    const page = new FakePage();
    page.add('#otp');
    const handler = new OtpHandler(createScriptedOperator());

    const result = await handler.submitOtpDetailed(page.asPage(), '#otp', '123456');

    expect(result.technique).toBe('focus-paste');
    expect(result.outcomes).toEqual([
      { technique: 'global-paste', succeeded: false },
      { technique: 'focus-paste', succeeded: true },
    ]);
    expect(page.get('#otp').value).toBe('123456');
    expect(page.contextStub.grantPermissions).toHaveBeenCalledTimes(1);
  });

  it('should type the code one character at a time when pasting is blocked', async () => {
    const page = new FakePage();
    page.add('#otp', { paste: 'ignored' });
    const handler = new OtpHandler(createScriptedOperator());

    const result = await handler.submitOtpDetailed(page.asPage(), '#otp', '4821');

    expect(result.technique).toBe('focus-type');
    expect(page.keyboard.type.mock.calls).toEqual([
      ['4', { delay: 100 }],
      ['8', { delay: 100 }],
      ['2', { delay: 100 }],
      ['1', { delay: 100 }],
    ]);
    expect(page.get('#otp').value).toBe('4821');
  });

  it('should target the first generic input when no selector is known', async () => {
    const page = new FakePage();
    page.add(GENERIC_OTP_TARGET, { paste: 'ignored' });

    const ok = await new OtpHandler(createScriptedOperator()).submitOtp(page.asPage(), undefined, '777000');

    expect(ok).toBe(true);
    expect(page.get('input').value).toBe('777000');
  });

  it('should hand over to the operator and report their confirmation', async () => {
    const page = new FakePage();
    page.add('#otp', { paste: 'ignored', keys: 'ignored' });
    const operator = createScriptedOperator({}, true);

    const result = await new OtpHandler(operator).submitOtpDetailed(page.asPage(), '#otp', '123456');

    expect(result.technique).toBe('operator');
    expect(result.outcomes.map((o) => o.technique)).toEqual([
      'global-paste',
      'focus-paste',
      'focus-type',
      'operator',
    ]);
    expect(operator.confirm).toHaveBeenCalledTimes(1);
    expect(operator.confirm.mock.calls[0]?.[0]).toContain('"123456"');
  });

  it('should fail when the operator declines', async () => {
    const page = new FakePage();
    page.add('#otp', { paste: 'ignored', keys: 'ignored' });

    const ok = await new OtpHandler(createScriptedOperator({}, false)).submitOtp(page.asPage(), '#otp', '123456');

    expect(ok).toBe(false);
  });

  it('should not click a target that is not visible', async () => {
    const page = new FakePage();
    const hidden = page.add('#otp', { visible: false });

    await new OtpHandler(createScriptedOperator()).submitOtp(page.asPage(), '#otp', '123456');

    expect(hidden.clicks).toBe(0);
    expect(page.keyboard.type).not.toHaveBeenCalled();
  });
});

describe('inputsHoldCode', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function withInputs(values: string[]): void {
    vi.stubGlobal('document', {
      querySelectorAll: () => values.map((value) => ({ value })),
    });
  }

  it('should accept a single input holding the whole code', () => {
    withInputs(['user@example.com', '123456']);
    expect(inputsHoldCode({ code: '123456' })).toBe(true);
  });

  it('should accept split single-digit inputs that spell the code', () => {
    withInputs(['1', '2', '3', '4', '5', '6']);
    expect(inputsHoldCode({ code: '123456' })).toBe(true);
  });

  it('should accept a contiguous run that does not start at the first input', () => {
    withInputs(['9', '1', '2', '3', '4', '5', '6']);
    expect(inputsHoldCode({ code: '123456' })).toBe(true);
  });

  it('should reject a run with a wrong digit', () => {
    withInputs(['1', '2', '3', 'x', '5', '6']);
    expect(inputsHoldCode({ code: '123456' })).toBe(false);
  });

  it('should reject a partially entered code', () => {
    withInputs(['1', '2', '3', '', '', '']);
    expect(inputsHoldCode({ code: '123456' })).toBe(false);
  });

  it('should reject multi-character fragments', () => {
    withInputs(['12', '3456']);
    expect(inputsHoldCode({ code: '123456' })).toBe(false);
  });

  it('should reject a page without inputs', () => {
    withInputs([]);
    expect(inputsHoldCode({ code: '123456' })).toBe(false);
  });
});
