import { Key } from '@nut-tree-fork/nut-js';

const modifierKeys = (): Record<string, Key> => ({
  shift: Key.LeftShift,
  control: Key.LeftControl,
  ctrl: Key.LeftControl,
  alt: Key.LeftAlt,
  option: Key.LeftAlt,
  meta: Key.LeftMeta,
  cmd: Key.LeftMeta,
  command: Key.LeftMeta,
  super: Key.LeftSuper,
  win: Key.LeftSuper,
});

const keyAliases: Record<string, string> = {
  ret: 'return',
  esc: 'escape',
  del: 'delete',
  spacebar: 'space',
};

let nutKeyMapLowercase: Record<string, Key> | null = null;

// Lowercase name → nut-js key, skipping the reverse (number → name) entries of the enum
function nutKeys(): Record<string, Key> {
  if (!nutKeyMapLowercase) {
    const map: Record<string, Key> = {};
    for (const [name, value] of Object.entries(Key)) {
      if (typeof value === 'number') {
        map[name.toLowerCase()] = value;
      }
    }
    nutKeyMapLowercase = map;
  }
  return nutKeyMapLowercase;
}

export function resolveKey(name: string): Key {
  const normalized = name.trim().toLowerCase();
  const alias = keyAliases[normalized] ?? normalized;
  const key = modifierKeys()[alias] ?? nutKeys()[alias];

  if (key === undefined) {
    throw new Error(`Invalid key: '${name}'. Key not found in available key mappings.`);
  }
  return key;
}

/**
 * Parses "Ctrl+Shift+N" style shortcuts into nut-js keys.
 */
export function parseShortcut(shortcut: string): Key[] {
  const segments = shortcut
    .split('+')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  if (segments.length === 0) {
    throw new Error(`Empty shortcut: '${shortcut}'`);
  }
  return segments.map(resolveKey);
}
