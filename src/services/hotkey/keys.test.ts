import { describe, expect, it } from 'vitest';
import { areModifiersHeld, parseHotkey } from './keys';

describe('parseHotkey', () => {
  it('parses modifiers and a special trigger key', () => {
    expect(parseHotkey('CommandOrControl+Shift+Space')).toEqual({
      source: 'CommandOrControl+Shift+Space',
      triggerKey: 'SPACE',
      requiredModifierGroups: [
        ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
        ['LEFT SHIFT', 'RIGHT SHIFT']
      ]
    });
  });

  it('accepts letters, digits and function keys in any case', () => {
    expect(parseHotkey('alt + d').triggerKey).toBe('D');
    expect(parseHotkey('Ctrl+7').triggerKey).toBe('7');
    expect(parseHotkey('Option+f9').triggerKey).toBe('F9');
  });

  it('rejects combos without a modifier and a key', () => {
    expect(() => parseHotkey('Space')).toThrow(
      'Hotkey must include at least one modifier and one key: Space'
    );
  });

  it('rejects unknown tokens, including Escape', () => {
    expect(() => parseHotkey('Ctrl+Escape')).toThrow("Unsupported hotkey token 'Escape' in Ctrl+Escape");
    expect(() => parseHotkey('Ctrl+PageUp')).toThrow("Unsupported hotkey token 'PageUp' in Ctrl+PageUp");
  });

  it('rejects two trigger keys', () => {
    expect(() => parseHotkey('Ctrl+A+B')).toThrow(
      'Hotkey must define exactly one non-modifier key: Ctrl+A+B'
    );
  });

  it('rejects a combo of modifiers only', () => {
    expect(() => parseHotkey('Ctrl+Shift')).toThrow('Hotkey missing a trigger key: Ctrl+Shift');
  });
});

describe('areModifiersHeld', () => {
  it('needs one key from every group', () => {
    const hotkey = parseHotkey('CmdOrCtrl+Shift+Space');

    expect(areModifiersHeld(hotkey, { 'RIGHT CTRL': true, 'LEFT SHIFT': true })).toBe(true);
    expect(areModifiersHeld(hotkey, { 'RIGHT CTRL': true })).toBe(false);
    expect(areModifiersHeld(hotkey, { 'LEFT META': true, 'RIGHT SHIFT': false })).toBe(false);
  });
});
