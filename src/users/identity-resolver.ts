import type { SenderRef } from '../bridge/types.js';

/** Source identity key (Telegram handle, or numeric id as a string) → Zulip full name. */
export type IdentityMap = ReadonlyMap<string, string>;

export type DisplayForm =
  | { kind: 'mention'; handle: string }
  | { kind: 'plain'; name: string };

export interface IdentityResolverOptions {
  /** Emit notifying `@**name**` mentions instead of silent `@_**name**` ones. */
  notifyMentions?: boolean;
}

/**
 * Maps Telegram senders to the form they take on Zulip.
 * A lookup miss is expected and degrades to the plain name.
 */
export class IdentityResolver {
  private readonly map: IdentityMap;
  private readonly notify: boolean;

  constructor(map: IdentityMap, opts: IdentityResolverOptions = {}) {
    this.map = new Map([...map].map(([key, name]): [string, string] => [normalizeHandle(key), name]));
    this.notify = opts.notifyMentions ?? false;
  }

  resolve(sender: SenderRef): DisplayForm {
    // 1. Public handle
    if (sender.handle) {
      const mapped = this.map.get(normalizeHandle(sender.handle));
      if (mapped) return { kind: 'mention', handle: mapped };
    }

    // 2. Numeric id, for users without a handle
    const byId = this.map.get(String(sender.id));
    if (byId) return { kind: 'mention', handle: byId };

    return { kind: 'plain', name: plainName(sender) };
  }

  /** Resolve a bare `@handle` that carries no user object. */
  resolveHandle(handle: string): DisplayForm {
    const mapped = this.map.get(normalizeHandle(handle));
    return mapped ? { kind: 'mention', handle: mapped } : { kind: 'plain', name: `@${handle}` };
  }

  toMarkup(form: DisplayForm): string {
    if (form.kind === 'plain') return form.name;
    return this.notify ? `@**${form.handle}**` : `@_**${form.handle}**`;
  }

  display(sender: SenderRef): string {
    return this.toMarkup(this.resolve(sender));
  }
}

/** Telegram usernames are case-insensitive; map keys and lookups use this form. */
export function normalizeHandle(handle: string): string {
  return handle.replace(/^@/, '').toLowerCase();
}

export function plainName(sender: SenderRef): string {
  const name = [sender.firstName, sender.lastName].filter(Boolean).join(' ').trim();
  if (name) return name;
  return sender.handle ? `@${sender.handle}` : String(sender.id);
}
