import { requireRegistry } from '../context.js';
import type { RuntimeContext } from '../context.js';
import { HELP_STATE, withHelpBlock } from './help.js';
import type { Menu } from './menu.js';

export const PREVIOUS_PAGE_EMOJI = '⬅️';
export const NEXT_PAGE_EMOJI = '➡️';
export const CLOSE_MENU_EMOJI = '❌';
export const HELP_EMOJI = '❔';

export async function nextPage(ctx: RuntimeContext, menu: Menu): Promise<void> {
  menu.currentPage = (menu.currentPage + 1) % menu.pages.length;
  await menu.displayPage(ctx);
}

export async function previousPage(ctx: RuntimeContext, menu: Menu): Promise<void> {
  menu.currentPage = menu.currentPage === 0 ? menu.pages.length - 1 : menu.currentPage - 1;
  await menu.displayPage(ctx);
}

export async function closeMenu(ctx: RuntimeContext, menu: Menu): Promise<void> {
  await menu.close(ctx);
  requireRegistry(ctx).remove(menu.message.get());
}

/**
 * Show the help block under the current page, or go back to the plain page
 * when it is already shown.
 */
export async function toggleHelp(ctx: RuntimeContext, menu: Menu): Promise<void> {
  const state = menu.data.getOrInsert(HELP_STATE, () => ({ shown: false }));
  if (state.shown) {
    // displayPage clears the flag.
    await menu.displayPage(ctx);
    return;
  }

  const page = await menu.renderCurrentPage();
  await ctx.client.editMessage(menu.message.get(), withHelpBlock(page, menu.helpText()));
  state.shown = true;
  ctx.log?.debug({ ...menu.message.get() }, 'menu:help displayed');
}
