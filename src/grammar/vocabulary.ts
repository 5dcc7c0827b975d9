import { ARGS_KEYWORD, type KeywordShape, type SectionKind } from '../core/types.js';

export type KeywordTable = Readonly<Record<string, KeywordShape>>;

const ARGS_SHAPE: KeywordShape = { type: 'pattern', repeatable: false };

// Trigger blocks carry no keyword token: every body line is a command.
export const TRIGGER_COMMAND = 'command';

const TRIGGER_KEYWORDS: KeywordTable = {
  [TRIGGER_COMMAND]: { type: 'pattern', repeatable: true }
};

const SERVICE_KEYWORDS: KeywordTable = {
  console: { type: 'boolean' },
  critical: { type: 'boolean' },
  disabled: { type: 'boolean' },
  oneshot: { type: 'boolean' },
  setenv: { type: 'pattern', repeatable: true },
  getenv: { type: 'pattern', repeatable: true },
  socket: { type: 'pattern', repeatable: true },
  onrestart: { type: 'pattern', repeatable: true },
  writepid: { type: 'pattern', repeatable: true },
  keycodes: { type: 'pattern', repeatable: true },
  user: { type: 'pattern', repeatable: false, default: 'root' },
  group: { type: 'pattern', repeatable: false, default: 'root' },
  class: { type: 'pattern', repeatable: false, default: 'default' },
  seclabel: { type: 'pattern', repeatable: false },
  ioprio: { type: 'pattern', repeatable: false },
  start: { type: 'pattern', repeatable: false },
  priority: { type: 'number', default: '0' }
};

const KEYWORDS: Record<SectionKind, KeywordTable> = {
  on: TRIGGER_KEYWORDS,
  service: SERVICE_KEYWORDS,
  import: {}
};

export function isSectionKind(value: string): value is SectionKind {
  return value === 'on' || value === 'service' || value === 'import';
}

export function keywordTable(kind: SectionKind): KeywordTable {
  return KEYWORDS[kind];
}

/** Every keyword addressable in a query for `kind`, `args` first. */
export function keywordNames(kind: SectionKind): string[] {
  return [ARGS_KEYWORD, ...Object.keys(KEYWORDS[kind])];
}

export function keywordShape(kind: SectionKind, name: string): KeywordShape | undefined {
  if (name === ARGS_KEYWORD) return ARGS_SHAPE;
  return Object.prototype.hasOwnProperty.call(KEYWORDS[kind], name) ? KEYWORDS[kind][name] : undefined;
}

export function defaultValues(kind: SectionKind): Array<[string, string]> {
  const defaults: Array<[string, string]> = [];
  for (const [name, shape] of Object.entries(KEYWORDS[kind])) {
    if (shape.type !== 'boolean' && shape.default !== undefined) {
      defaults.push([name, shape.default]);
    }
  }
  return defaults;
}

