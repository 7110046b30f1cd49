import { IGlobalKey, IGlobalKeyDownMap, IGlobalKeyListener } from 'node-global-key-listener';

export interface ParsedHotkey {
  source: string;
  triggerKey: IGlobalKey;
  requiredModifierGroups: IGlobalKey[][];
}

/** The part of `GlobalKeyboardListener` the hotkey classes use; one listener is shared per process. */
export interface KeyboardListener {
  addListener(listener: IGlobalKeyListener): Promise<void>;
  removeListener(listener: IGlobalKeyListener): void;
}

const LETTER_KEYS: IGlobalKey[] = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K', 'L', 'M',
  'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V', 'W', 'X', 'Y', 'Z'
];

const DIGIT_KEYS: IGlobalKey[] = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'];

const FUNCTION_KEYS: IGlobalKey[] = [
  'F1', 'F2', 'F3', 'F4', 'F5', 'F6', 'F7', 'F8', 'F9', 'F10', 'F11', 'F12'
];

const MAIN_KEYS = new Map<string, IGlobalKey>(
  [...LETTER_KEYS, ...DIGIT_KEYS, ...FUNCTION_KEYS].map((key) => [key.toLowerCase(), key])
);

const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  commandorcontrol: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
  cmdorctrl: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL']
};

const SPECIAL_KEY_ALIASES: Record<string, IGlobalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  backspace: 'BACKSPACE',
  delete: 'DELETE'
};

/**
 * Parses an accelerator such as `CommandOrControl+Shift+Space`. Escape is reserved for
 * cancelling a recording, so it cannot be part of the toggle combo.
 */
export const parseHotkey = (accelerator: string): ParsedHotkey => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length < 2) {
    throw new Error(`Hotkey must include at least one modifier and one key: ${accelerator}`);
  }

  const modifierGroups: IGlobalKey[][] = [];
  let trigger: IGlobalKey | undefined;

  for (const token of tokens) {
    const normalized = token.toLowerCase();
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      modifierGroups.push(modifierGroup);
      continue;
    }

    const candidate = SPECIAL_KEY_ALIASES[normalized] ?? MAIN_KEYS.get(normalized);
    if (!candidate) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (trigger) {
      throw new Error(`Hotkey must define exactly one non-modifier key: ${accelerator}`);
    }

    trigger = candidate;
  }

  if (!trigger) {
    throw new Error(`Hotkey missing a trigger key: ${accelerator}`);
  }

  return {
    source: accelerator,
    triggerKey: trigger,
    requiredModifierGroups: modifierGroups
  };
};

export const areModifiersHeld = (hotkey: ParsedHotkey, down: IGlobalKeyDownMap): boolean =>
  hotkey.requiredModifierGroups.every((group) => group.some((key) => down[key]));
