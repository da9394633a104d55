import { noCache, pageNotFound } from '../errors.js';
import { requireRegistry } from '../context.js';
import type { RuntimeContext } from '../context.js';
import type { Listener } from '../core/listener.js';
import type { MessageIdentityCell } from '../core/identity-cell.js';
import type { MessageIdentity } from '../core/message-identity.js';
import type { ReactionNotification } from '../events/notifications.js';
import type { MessageContent } from '../transport/types.js';
import { HELP_STATE, formatHelpLines } from './help.js';
import type { HelpLine } from './help.js';
import type { MenuData } from './menu-data.js';
import type { Page } from './page.js';

export type ControlRun = (ctx: RuntimeContext, menu: Menu, reaction: ReactionNotification) => Promise<void>;

/** A control bound to one emoji. `position` orders reactions and help lines. */
export type MenuAction = {
  position: number;
  run: ControlRun;
};

export type MenuInit = {
  message: MessageIdentityCell;
  pages: readonly Page[];
  currentPage: number;
  controls: ReadonlyMap<string, MenuAction>;
  helpEntries: ReadonlyMap<string, string>;
  /** Absolute deadline on the `now` clock. */
  deadline: number;
  sticky: boolean;
  data: MenuData;
  owner: string | null;
  now: () => number;
};

/** Controls in display order: ascending position, insertion order on ties. */
export function sortControls(controls: ReadonlyMap<string, MenuAction>): Array<[string, MenuAction]> {
  return [...controls.entries()].sort(([, a], [, b]) => a.position - b.position);
}

/**
 * Paginated, reaction-driven menu. Active until it times out or is closed;
 * once closed every callback returns without doing anything.
 *
 * All state is touched only through the menu's ListenerHandle, which holds
 * the handle's lock for each call.
 */
export class Menu implements Listener {
  readonly message: MessageIdentityCell;
  readonly pages: readonly Page[];
  currentPage: number;
  readonly controls: ReadonlyMap<string, MenuAction>;
  readonly helpEntries: ReadonlyMap<string, string>;
  deadline: number;
  sticky: boolean;
  readonly data: MenuData;
  readonly owner: string | null;
  private closed = false;
  private readonly now: () => number;

  constructor(init: MenuInit) {
    this.message = init.message;
    this.pages = init.pages;
    this.currentPage = init.currentPage;
    this.controls = init.controls;
    this.helpEntries = init.helpEntries;
    this.deadline = init.deadline;
    this.sticky = init.sticky;
    this.data = init.data;
    this.owner = init.owner;
    this.now = init.now;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getCurrentPage(): Page {
    const page = this.pages[this.currentPage];
    if (!page) throw pageNotFound(this.currentPage);
    return page;
  }

  /** Fresh content of the current page. */
  async renderCurrentPage(): Promise<MessageContent> {
    return this.getCurrentPage()();
  }

  /** Replace the message content with the plain current page. */
  async displayPage(ctx: RuntimeContext): Promise<void> {
    const content = await this.renderCurrentPage();
    await ctx.client.editMessage(this.message.get(), content);
    this.markHelpHidden();
    ctx.log?.debug({ page: this.currentPage, ...this.message.get() }, 'menu:page displayed');
  }

  sortedControls(): Array<[string, MenuAction]> {
    return sortControls(this.controls);
  }

  /** Help block text; controls without a help entry are left out. */
  helpText(): string {
    const lines: HelpLine[] = [];
    for (const [emoji, text] of this.helpEntries) {
      const control = this.controls.get(emoji);
      if (control) lines.push({ emoji, text, position: control.position });
    }
    return formatHelpLines(lines);
  }

  /** Strip all reactions from the message and mark the menu closed. */
  async close(ctx: RuntimeContext): Promise<void> {
    await ctx.client.removeAllReactions(this.message.get());
    this.closed = true;
    ctx.log?.debug({ ...this.message.get() }, 'menu:closed');
  }

  /**
   * Move the menu to a freshly sent message at the bottom of its channel.
   * The registry entry is rekeyed before the old message is deleted, so a
   * delete notification for the old message finds nothing to evict.
   */
  async recreate(ctx: RuntimeContext): Promise<void> {
    const registry = requireRegistry(ctx);
    const old = await this.message.read();
    const content = await this.renderCurrentPage();

    const sent = await ctx.client.sendMessage(old.channelId, content);
    let replaced = false;
    try {
      for (const [emoji] of this.sortedControls()) {
        await ctx.client.addReaction(sent.identity, emoji);
      }
      await this.message.replace(sent.identity);
      replaced = true;
      registry.rekey(old, sent.identity);
    } catch (err) {
      // Leave no unregistered copy behind; the menu stays on the old message.
      if (replaced) await this.message.replace(old);
      await this.discardCopy(ctx, sent.identity);
      throw err;
    }
    this.markHelpHidden();

    await ctx.client.deleteMessage(old);
    ctx.log?.info(
      { channelId: old.channelId, from: old.messageId, to: sent.identity.messageId },
      'menu:relocated',
    );
  }

  isFinished(): boolean {
    return this.closed;
  }

  async onTick(ctx: RuntimeContext): Promise<void> {
    if (this.closed) return;

    if (this.now() >= this.deadline) {
      ctx.log?.debug({ ...this.message.get() }, 'menu:timeout reached');
      await this.close(ctx);
      return;
    }

    if (this.sticky) {
      const identity = await this.message.read();
      const newer = await ctx.client.listMessagesAfter(identity.channelId, identity, 1);
      if (newer.length > 0) {
        await this.recreate(ctx);
      }
    }
  }

  async onReactionAdded(ctx: RuntimeContext, reaction: ReactionNotification): Promise<void> {
    if (this.closed) return;
    const userId = reaction.userId;
    if (userId === null) throw noCache();

    // Our own control reactions must not trigger controls.
    if (await isOwnReaction(ctx, reaction, userId)) return;

    // Controls behave as buttons: the reaction is always taken back off.
    await ctx.client.removeReaction(reaction.identity, reaction.emoji, userId);

    if (this.owner !== null && this.owner !== userId) {
      ctx.log?.debug({ userId, owner: this.owner }, 'menu:reaction ignored (not owner)');
      return;
    }

    const control = this.controls.get(reaction.emoji);
    if (!control) return;
    await control.run(ctx, this, reaction);
  }

  async onDeleted(ctx: RuntimeContext): Promise<void> {
    this.closed = true;
    ctx.log?.debug({ ...this.message.get() }, 'menu:message deleted');
  }

  private async discardCopy(ctx: RuntimeContext, copy: MessageIdentity): Promise<void> {
    try {
      await ctx.client.deleteMessage(copy);
    } catch (err) {
      ctx.log?.error({ err, ...copy }, 'menu:failed to delete unregistered copy');
    }
  }

  private markHelpHidden(): void {
    const help = this.data.get(HELP_STATE);
    if (help) help.shown = false;
  }
}

async function isOwnReaction(ctx: RuntimeContext, reaction: ReactionNotification, userId: string): Promise<boolean> {
  if (reaction.isCurrentUser) return true;
  const me = await ctx.client.currentUser();
  return me.id === userId;
}
