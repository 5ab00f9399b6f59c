import type { MentionEntity } from '../bridge/types.js';

/** Returns the replacement for an entity, or undefined to keep the original text. */
export type MentionReplacer = (entity: MentionEntity, original: string) => string | undefined;

/**
 * Rewrite mention ranges of `text` using the entity offsets supplied by Telegram.
 * Offsets are UTF-16 code units, so they index JS strings directly.
 * Entities out of range, overlapping an earlier one, or a handle mention whose
 * range does not start with `@` are left untouched.
 */
export function substituteMentions(text: string, entities: readonly MentionEntity[], replace: MentionReplacer): string {
  if (entities.length === 0) return text;

  const ordered = [...entities].sort((a, b) => a.offset - b.offset);
  let out = '';
  let cursor = 0;

  for (const entity of ordered) {
    const end = entity.offset + entity.length;
    if (entity.offset < cursor || entity.length <= 0 || end > text.length) continue;

    const original = text.slice(entity.offset, end);
    if (!entity.user && !original.startsWith('@')) continue;

    const replacement = replace(entity, original);
    if (replacement === undefined) continue;

    out += text.slice(cursor, entity.offset) + replacement;
    cursor = end;
  }

  return out + text.slice(cursor);
}
