/**
 * Key bindings for the stream widget.
 *
 * Key events use the shape of Node's readline `keypress` events. Bindings are
 * written as `name` with optional `C-` (ctrl), `M-` (meta) and `S-` (shift)
 * prefixes, e.g. `j`, `C-f`, `S-g`.
 */

import { keyActionSchema, type KeyAction, type KeymapConfig } from '../app/config.js';

export interface KeyEvent {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export interface KeyBinding {
  name: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

export type KeyCommand = { type: KeyAction } | { type: 'collapseToDepth'; depth: number };

const MODIFIER = /^([CMS])-(.+)$/;

export function parseBinding(text: string): KeyBinding {
  const binding: KeyBinding = { name: text, ctrl: false, meta: false, shift: false };
  for (let match = MODIFIER.exec(binding.name); match; match = MODIFIER.exec(binding.name)) {
    if (match[1] === 'C') binding.ctrl = true;
    else if (match[1] === 'M') binding.meta = true;
    else binding.shift = true;
    binding.name = match[2];
  }
  return binding;
}

export function matchesBinding(key: KeyEvent, binding: KeyBinding): boolean {
  // Keys readline cannot name (e.g. "/") only carry their sequence
  const name = key.name ?? key.sequence;
  return (
    name === binding.name &&
    Boolean(key.ctrl) === binding.ctrl &&
    Boolean(key.meta) === binding.meta &&
    Boolean(key.shift) === binding.shift
  );
}

export class Keymap {
  private readonly bindings: Array<{ action: KeyAction; binding: KeyBinding }> = [];

  constructor(config: KeymapConfig) {
    for (const [action, keys] of Object.entries(config)) {
      const known = keyActionSchema.safeParse(action);
      if (!known.success || !keys) continue;
      for (const key of keys) this.bindings.push({ action: known.data, binding: parseBinding(key) });
    }
  }

  /** Command bound to a key, or null. Plain digits 1-9 collapse to depth N-1. */
  resolve(key: KeyEvent): KeyCommand | null {
    for (const { action, binding } of this.bindings) {
      if (matchesBinding(key, binding)) return { type: action };
    }

    const name = key.name ?? key.sequence ?? '';
    if (!key.ctrl && !key.meta && /^[1-9]$/.test(name)) {
      return { type: 'collapseToDepth', depth: Number(name) - 1 };
    }
    return null;
  }
}
