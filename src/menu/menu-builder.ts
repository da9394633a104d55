import { pageNotFound } from '../errors.js';
import { requireRegistry } from '../context.js';
import type { RuntimeContext } from '../context.js';
import { MessageIdentityCell } from '../core/identity-cell.js';
import { ListenerHandle } from '../core/listener.js';
import { LONG_TIMEOUT_MS } from '../core/timeouts.js';
import {
  CLOSE_MENU_EMOJI,
  HELP_EMOJI,
  NEXT_PAGE_EMOJI,
  PREVIOUS_PAGE_EMOJI,
  closeMenu,
  nextPage,
  previousPage,
  toggleHelp,
} from './controls.js';
import { HELP_STATE } from './help.js';
import { Menu, sortControls } from './menu.js';
import type { ControlRun, MenuAction } from './menu.js';
import { MenuData } from './menu-data.js';
import type { DataKey } from './menu-data.js';
import type { Page } from './page.js';

export const DEFAULT_MENU_TIMEOUT_MS = LONG_TIMEOUT_MS;
export const HELP_CONTROL_POSITION = 100;

/**
 * Fluent builder for reaction menus.
 *
 * ```ts
 * const handle = await MenuBuilder.paginator()
 *   .addPages([textPage('one'), textPage('two')])
 *   .showHelp()
 *   .owner(message.author.id)
 *   .build(runtime.context, message.channelId);
 * ```
 */
export class MenuBuilder {
  private readonly pages: Page[] = [];
  private currentPage = 0;
  private readonly controls = new Map<string, MenuAction>();
  private timeoutMs = DEFAULT_MENU_TIMEOUT_MS;
  private isSticky = false;
  private readonly dataWriters: Array<(data: MenuData) => void> = [];
  private readonly helpEntries = new Map<string, string>();
  private ownerId: string | null = null;
  private now: () => number = () => performance.now();

  /** Builder preloaded with previous / close / next controls. */
  static paginator(): MenuBuilder {
    return new MenuBuilder()
      .addControl(0, PREVIOUS_PAGE_EMOJI, previousPage)
      .addHelp(PREVIOUS_PAGE_EMOJI, 'Displays the previous page')
      .addControl(1, CLOSE_MENU_EMOJI, closeMenu)
      .addHelp(CLOSE_MENU_EMOJI, 'Closes the menu buttons')
      .addControl(2, NEXT_PAGE_EMOJI, nextPage)
      .addHelp(NEXT_PAGE_EMOJI, 'Displays the next page');
  }

  addPage(page: Page): this {
    this.pages.push(page);
    return this;
  }

  addPages(pages: Iterable<Page>): this {
    for (const page of pages) this.pages.push(page);
    return this;
  }

  /** Bind `emoji` to `run`. A later control for the same emoji replaces it. */
  addControl(position: number, emoji: string, run: ControlRun): this {
    this.controls.set(emoji, { position, run });
    return this;
  }

  addControls(controls: Iterable<readonly [position: number, emoji: string, run: ControlRun]>): this {
    for (const [position, emoji, run] of controls) {
      this.addControl(position, emoji, run);
    }
    return this;
  }

  /** How long the menu stays active; counted from build(). */
  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  startPage(index: number): this {
    this.currentPage = index;
    return this;
  }

  /** Keep the menu as the last message of its channel by relocating it. */
  sticky(value = true): this {
    this.isSticky = value;
    return this;
  }

  addData<T>(key: DataKey<T>, value: T): this {
    this.dataWriters.push((data) => data.set(key, value));
    return this;
  }

  addHelp(emoji: string, text: string): this {
    this.helpEntries.set(emoji, text);
    return this;
  }

  /** Add the help toggle control. */
  showHelp(): this {
    this.dataWriters.push((data) => data.set(HELP_STATE, { shown: false }));
    return this.addControl(HELP_CONTROL_POSITION, HELP_EMOJI, toggleHelp)
      .addHelp(HELP_EMOJI, 'Shows or hides this help');
  }

  /** Only this user's reactions run controls; everyone else's are just removed. */
  owner(userId: string): this {
    this.ownerId = userId;
    return this;
  }

  /** Monotonic clock the deadline is measured on. */
  clock(now: () => number): this {
    this.now = now;
    return this;
  }

  /**
   * Send the start page to `channelId`, register the menu and attach its
   * controls. Reactions are added only after the menu is registered, so a
   * reaction arriving the moment it appears finds a live listener.
   *
   * Returns the cell holding the menu message's current identity.
   */
  async build(ctx: RuntimeContext, channelId: string): Promise<MessageIdentityCell> {
    const startPage = this.pages[this.currentPage];
    if (!startPage) throw pageNotFound(this.currentPage);
    const registry = requireRegistry(ctx);

    const sent = await ctx.client.sendMessage(channelId, await startPage());
    const controls = sortControls(this.controls);

    const data = new MenuData();
    for (const write of this.dataWriters) write(data);

    const cell = new MessageIdentityCell(sent.identity);
    const menu = new Menu({
      message: cell,
      pages: [...this.pages],
      currentPage: this.currentPage,
      controls: new Map(this.controls),
      helpEntries: new Map(this.helpEntries),
      deadline: this.now() + this.timeoutMs,
      sticky: this.isSticky,
      data,
      owner: this.ownerId,
      now: this.now,
    });

    registry.insert(sent.identity, new ListenerHandle(menu));
    ctx.log?.debug({ ...sent.identity, pages: this.pages.length, controls: controls.length }, 'menu:registered');

    for (const [emoji] of controls) {
      await ctx.client.addReaction(sent.identity, emoji);
    }
    return cell;
  }
}
