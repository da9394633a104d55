import { describe, expect, it, vi } from 'vitest';
import type { MessageIdentityCell } from '../core/identity-cell.js';
import type { MessageIdentity } from '../core/message-identity.js';
import { isReactionMenusError } from '../errors.js';
import { routeDeleted, routeReaction } from '../events/default-routes.js';
import { createRuntime } from '../runtime.js';
import { BOT_USER_ID, FakeMessagingClient } from '../testing/fake-messaging-client.js';
import { CLOSE_MENU_EMOJI, HELP_EMOJI, NEXT_PAGE_EMOJI, PREVIOUS_PAGE_EMOJI } from './controls.js';
import { Menu } from './menu.js';
import type { ControlRun } from './menu.js';
import { MenuBuilder } from './menu-builder.js';
import { DataKey } from './menu-data.js';
import { textPage } from './page.js';

const CHANNEL = '500';
const USER = '42';
const FIRST_MESSAGE_ID = '1000000000000000000';

function mockLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup() {
  const client = new FakeMessagingClient();
  const log = mockLog();
  const runtime = createRuntime({ client, log });
  return { client, log, runtime, ctx: runtime.context };
}

function threePages(): MenuBuilder {
  return MenuBuilder.paginator().addPages([textPage('page 1'), textPage('page 2'), textPage('page 3')]);
}

/** React as `userId` the way the gateway would, then route it. */
async function press(
  s: ReturnType<typeof setup>,
  identity: MessageIdentity,
  emoji: string,
  userId: string | null = USER,
): Promise<void> {
  if (userId !== null) s.client.react(identity, emoji, userId);
  await routeReaction(s.ctx, { identity, emoji, userId, isCurrentUser: userId === BOT_USER_ID }, 'add');
}

async function currentMenu(s: ReturnType<typeof setup>, cell: MessageIdentityCell): Promise<Menu> {
  const handle = s.runtime.registry.get(cell.get());
  if (!handle) throw new Error('menu not registered');
  return handle.withListener((l) => {
    if (!(l instanceof Menu)) throw new Error('not a menu');
    return l;
  });
}

describe('MenuBuilder.build', () => {
  it('sends the start page, registers the menu and reacts in position order', async () => {
    const s = setup();
    const cell = await threePages().showHelp().build(s.ctx, CHANNEL);

    expect(cell.get()).toEqual({ channelId: CHANNEL, messageId: FIRST_MESSAGE_ID });
    expect(s.client.message(cell.get())?.content).toEqual({ content: 'page 1' });
    expect(s.runtime.registry.has(cell.get())).toBe(true);
    expect(s.client.reactionsOn(cell.get())).toEqual([
      PREVIOUS_PAGE_EMOJI,
      CLOSE_MENU_EMOJI,
      NEXT_PAGE_EMOJI,
      HELP_EMOJI,
    ]);
    expect(s.log.debug).toHaveBeenCalledWith(
      { channelId: CHANNEL, messageId: FIRST_MESSAGE_ID, pages: 3, controls: 4 },
      'menu:registered',
    );
  });

  it('rejects a start page that does not exist before sending anything', async () => {
    const s = setup();
    const built = threePages().startPage(5).build(s.ctx, CHANNEL);

    await expect(built).rejects.toMatchObject({ code: 'PAGE_NOT_FOUND', pageIndex: 5 });
    await expect(built).rejects.toThrow('Page 5 not found');
    expect(s.client.callsOf('sendMessage')).toHaveLength(0);
  });

  it('rejects a menu without pages', async () => {
    const s = setup();
    await expect(new MenuBuilder().build(s.ctx, CHANNEL)).rejects.toMatchObject({ code: 'PAGE_NOT_FOUND', pageIndex: 0 });
  });

  it('fails with UNINITIALIZED when the context has no registry', async () => {
    const client = new FakeMessagingClient();
    await expect(threePages().build({ client }, CHANNEL)).rejects.toMatchObject({ code: 'UNINITIALIZED' });
    expect(client.callsOf('sendMessage')).toHaveLength(0);
  });
});

describe('paginator controls', () => {
  it('previous wraps to the last page and next wraps to the first', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);

    await press(s, cell.get(), PREVIOUS_PAGE_EMOJI);
    expect((await currentMenu(s, cell)).currentPage).toBe(2);
    expect(s.client.message(cell.get())?.content).toEqual({ content: 'page 3' });

    await press(s, cell.get(), NEXT_PAGE_EMOJI);
    await press(s, cell.get(), NEXT_PAGE_EMOJI);
    expect((await currentMenu(s, cell)).currentPage).toBe(1);
    expect(s.client.message(cell.get())?.content).toEqual({ content: 'page 2' });
  });

  it('removes the user reaction but keeps the bot control', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);

    await press(s, cell.get(), NEXT_PAGE_EMOJI);
    expect(s.client.callsOf('removeReaction')).toEqual([
      { op: 'removeReaction', identity: cell.get(), emoji: NEXT_PAGE_EMOJI, userId: USER },
    ]);
    expect(s.client.message(cell.get())?.reactions.get(NEXT_PAGE_EMOJI)).toEqual(new Set([BOT_USER_ID]));
  });

  it('ignores reactions on emoji that have no control', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);

    await press(s, cell.get(), '🎉');
    expect(s.client.callsOf('editMessage')).toHaveLength(0);
    expect(s.client.reactionsOn(cell.get())).toEqual([PREVIOUS_PAGE_EMOJI, CLOSE_MENU_EMOJI, NEXT_PAGE_EMOJI]);
  });

  it('close strips reactions and drops the registry entry', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);

    await press(s, cell.get(), CLOSE_MENU_EMOJI);
    expect(s.client.reactionsOn(cell.get())).toEqual([]);
    expect(s.runtime.registry.has(cell.get())).toBe(false);
    expect(s.client.exists(cell.get())).toBe(true);
  });
});

describe('reaction filtering', () => {
  it('only the owner drives an owner-restricted menu', async () => {
    const s = setup();
    const cell = await threePages().owner(USER).build(s.ctx, CHANNEL);

    await press(s, cell.get(), NEXT_PAGE_EMOJI, '43');
    expect(s.client.callsOf('removeReaction')).toHaveLength(1);
    expect(s.client.callsOf('editMessage')).toHaveLength(0);
    expect((await currentMenu(s, cell)).currentPage).toBe(0);
    expect(s.log.debug).toHaveBeenCalledWith({ userId: '43', owner: USER }, 'menu:reaction ignored (not owner)');

    await press(s, cell.get(), NEXT_PAGE_EMOJI, USER);
    expect((await currentMenu(s, cell)).currentPage).toBe(1);
  });

  it('ignores the bot\'s own reactions without removing them', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);

    await press(s, cell.get(), NEXT_PAGE_EMOJI, BOT_USER_ID);
    expect(s.client.callsOf('removeReaction')).toHaveLength(0);
    expect((await currentMenu(s, cell)).currentPage).toBe(0);
  });

  it('recognises its own reaction by user ID when the flag is not set', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);

    await routeReaction(
      s.ctx,
      { identity: cell.get(), emoji: NEXT_PAGE_EMOJI, userId: BOT_USER_ID, isCurrentUser: false },
      'add',
    );
    expect(s.client.callsOf('currentUser')).toHaveLength(1);
    expect(s.client.callsOf('removeReaction')).toHaveLength(0);
  });

  it('fails with NO_CACHE when the reacting user is unknown', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);

    let caught: unknown;
    try {
      await press(s, cell.get(), NEXT_PAGE_EMOJI, null);
    } catch (err) {
      caught = err;
    }
    expect(isReactionMenusError(caught, 'NO_CACHE')).toBe(true);
    expect(s.client.callsOf('removeReaction')).toHaveLength(0);
  });
});

describe('help toggle', () => {
  const HELP_TEXT = [
    ` - ${PREVIOUS_PAGE_EMOJI} Displays the previous page`,
    ` - ${CLOSE_MENU_EMOJI} Closes the menu buttons`,
    ` - ${NEXT_PAGE_EMOJI} Displays the next page`,
    ` - ${HELP_EMOJI} Shows or hides this help`,
  ].join('\n');

  it('shows the help block, then restores the plain page', async () => {
    const s = setup();
    const cell = await threePages().showHelp().build(s.ctx, CHANNEL);

    await press(s, cell.get(), HELP_EMOJI);
    expect(s.client.message(cell.get())?.content).toEqual({
      content: 'page 1',
      embeds: [{ fields: [{ name: 'Help', value: HELP_TEXT, inline: false }] }],
    });

    await press(s, cell.get(), HELP_EMOJI);
    expect(s.client.message(cell.get())?.content).toEqual({ content: 'page 1' });
  });

  it('turning the page hides the help block', async () => {
    const s = setup();
    const cell = await threePages().showHelp().build(s.ctx, CHANNEL);

    await press(s, cell.get(), HELP_EMOJI);
    await press(s, cell.get(), NEXT_PAGE_EMOJI);
    expect(s.client.message(cell.get())?.content).toEqual({ content: 'page 2' });

    // Hidden again, so the next toggle shows it.
    await press(s, cell.get(), HELP_EMOJI);
    expect(s.client.message(cell.get())?.content?.embeds?.[0]?.fields?.[0]?.name).toBe('Help');
  });

  it('lists only controls that have a help entry', async () => {
    const s = setup();
    const cell = await threePages()
      .addControl(3, '🔁', async () => {})
      .addHelp('🚫', 'Not bound to any control')
      .showHelp()
      .build(s.ctx, CHANNEL);

    expect(s.client.reactionsOn(cell.get())).toEqual([
      PREVIOUS_PAGE_EMOJI,
      CLOSE_MENU_EMOJI,
      NEXT_PAGE_EMOJI,
      '🔁',
      HELP_EMOJI,
    ]);
    await press(s, cell.get(), HELP_EMOJI);
    expect(s.client.message(cell.get())?.content.embeds?.[0]?.fields?.[0]?.value).toBe(HELP_TEXT);
  });

  it('menus built from one builder keep separate help state', async () => {
    const s = setup();
    const builder = threePages().showHelp();
    const first = await builder.build(s.ctx, CHANNEL);
    const second = await builder.build(s.ctx, CHANNEL);

    await press(s, first.get(), HELP_EMOJI);
    await press(s, second.get(), HELP_EMOJI);
    expect(s.client.message(second.get())?.content?.embeds).toHaveLength(1);
  });
});

describe('sweeping', () => {
  it('relocates a sticky menu below a newer message', async () => {
    const s = setup();
    const cell = await threePages().sticky().build(s.ctx, CHANNEL);
    const before = cell.get();
    s.client.postAs('77', CHANNEL, { content: 'chatter' });

    await expect(s.runtime.sweeper.sweep()).resolves.toEqual([]);

    const moved = cell.get();
    expect(moved).toEqual({ channelId: CHANNEL, messageId: '1000000000000000002' });
    expect(s.runtime.registry.has(moved)).toBe(true);
    expect(s.runtime.registry.has(before)).toBe(false);
    expect(s.client.exists(before)).toBe(false);
    expect(s.client.message(moved)?.content).toEqual({ content: 'page 1' });
    expect(s.client.reactionsOn(moved)).toEqual([PREVIOUS_PAGE_EMOJI, CLOSE_MENU_EMOJI, NEXT_PAGE_EMOJI]);
    expect(s.log.info).toHaveBeenCalledWith(
      { channelId: CHANNEL, from: before.messageId, to: moved.messageId },
      'menu:relocated',
    );
  });

  it('leaves a sticky menu alone when it is already the last message', async () => {
    const s = setup();
    const cell = await threePages().sticky().build(s.ctx, CHANNEL);

    await s.runtime.sweeper.sweep();
    expect(cell.get().messageId).toBe(FIRST_MESSAGE_ID);
    expect(s.client.callsOf('sendMessage')).toHaveLength(1);
  });

  it('a delete of the old message after relocation evicts nothing', async () => {
    const s = setup();
    const cell = await threePages().sticky().build(s.ctx, CHANNEL);
    const before = cell.get();
    s.client.postAs('77', CHANNEL, { content: 'chatter' });
    await s.runtime.sweeper.sweep();

    await expect(routeDeleted(s.ctx, [before])).resolves.toBe(0);
    expect(s.runtime.registry.has(cell.get())).toBe(true);
  });

  it('closes and evicts the menu once its deadline passes', async () => {
    const s = setup();
    let now = 0;
    const cell = await threePages().timeout(1_000).clock(() => now).build(s.ctx, CHANNEL);

    now = 999;
    await expect(s.runtime.sweeper.sweep()).resolves.toEqual([]);
    expect(s.client.reactionsOn(cell.get())).toHaveLength(3);

    now = 1_000;
    await expect(s.runtime.sweeper.sweep()).resolves.toEqual([cell.get()]);
    expect(s.client.reactionsOn(cell.get())).toEqual([]);
    expect(s.runtime.registry.size).toBe(0);
  });
});

describe('message deletion', () => {
  it('marks the menu closed and removes it from the registry', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);
    const menu = await currentMenu(s, cell);

    s.runtime.dispatcher.dispatch('messageDelete', { identity: cell.get() });
    await s.runtime.dispatcher.idle();

    expect(menu.isClosed).toBe(true);
    expect(s.runtime.registry.size).toBe(0);
  });
});

describe('custom controls', () => {
  it('runs a control with the live menu and its data', async () => {
    const s = setup();
    const PRESSES = new DataKey<{ count: number }>('presses');
    const seen: Menu[] = [];
    const cell = await new MenuBuilder()
      .addPage(textPage('only'))
      .addData(PRESSES, { count: 0 })
      .addControl(0, '🔁', async (_ctx, menu) => {
        seen.push(menu);
        const presses = menu.data.get(PRESSES);
        if (presses) presses.count++;
      })
      .build(s.ctx, CHANNEL);

    await press(s, cell.get(), '🔁');
    await press(s, cell.get(), '🔁');

    const menu = await currentMenu(s, cell);
    expect(seen).toHaveLength(2);
    expect(seen[0]).toBe(menu);
    expect(seen[1]).toBe(menu);
    expect(menu.data.get(PRESSES)).toEqual({ count: 2 });
  });

  it('a later control for the same emoji replaces the earlier one', async () => {
    const s = setup();
    const first = vi.fn(async () => {});
    const second = vi.fn(async () => {});
    const controls: Array<readonly [number, string, ControlRun]> = [
      [0, '⭐', first],
      [1, '⭐', second],
    ];
    const cell = await new MenuBuilder().addPage(textPage('only')).addControls(controls).build(s.ctx, CHANNEL);

    expect(s.client.callsOf('addReaction')).toHaveLength(1);
    await press(s, cell.get(), '⭐');
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(s.client.reactionsOn(cell.get())).toEqual(['⭐']);
  });
});

describe('transport failures', () => {
  it('a failed page edit reaches the caller and keeps the menu registered', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);
    const err = new Error('Missing Permissions');
    s.client.failNext('editMessage', err);

    await expect(press(s, cell.get(), NEXT_PAGE_EMOJI)).rejects.toBe(err);
    expect(s.runtime.registry.has(cell.get())).toBe(true);
    expect((await currentMenu(s, cell)).isClosed).toBe(false);
  });

  it('the dispatcher logs a failed control and keeps the menu registered', async () => {
    const s = setup();
    const cell = await threePages().build(s.ctx, CHANNEL);
    const err = new Error('Missing Permissions');
    s.client.failNext('editMessage', err);

    s.client.react(cell.get(), NEXT_PAGE_EMOJI, USER);
    s.runtime.dispatcher.dispatch('reactionAdd', {
      identity: cell.get(),
      emoji: NEXT_PAGE_EMOJI,
      userId: USER,
      isCurrentUser: false,
    });
    await s.runtime.dispatcher.idle();

    expect(s.log.error).toHaveBeenCalledWith({ err, kind: 'reactionAdd' }, 'dispatch:callback failed');
    expect(s.runtime.registry.has(cell.get())).toBe(true);
  });

  it('a timed-out menu whose reactions could not be cleared closes on the next sweep', async () => {
    const s = setup();
    let now = 0;
    const cell = await threePages().timeout(1_000).clock(() => now).build(s.ctx, CHANNEL);
    const err = new Error('Service Unavailable');
    s.client.failNext('removeAllReactions', err);

    now = 1_000;
    await expect(s.runtime.sweeper.sweep()).resolves.toEqual([]);
    expect(s.runtime.registry.has(cell.get())).toBe(true);
    expect(s.log.error).toHaveBeenCalledWith({ err, ...cell.get() }, 'sweeper:tick failed');

    await expect(s.runtime.sweeper.sweep()).resolves.toEqual([cell.get()]);
    expect(s.client.reactionsOn(cell.get())).toEqual([]);
  });

  it('a failed relocation deletes the new copy and keeps the menu in place', async () => {
    const s = setup();
    const cell = await MenuBuilder.paginator()
      .addPages([textPage('page 1'), textPage('page 2')])
      .sticky()
      .build(s.ctx, CHANNEL);
    const home = cell.get();
    s.client.postAs('77', CHANNEL, { content: 'chatter' });

    for (let i = 0; i < 3; i++) {
      s.client.failNext('addReaction', new Error('Rate limited'));
      await expect(s.runtime.sweeper.sweep()).resolves.toEqual([]);
    }

    expect(s.client.callsOf('sendMessage')).toHaveLength(4);
    for (const copy of ['1000000000000000002', '1000000000000000003', '1000000000000000004']) {
      expect(s.client.exists({ channelId: CHANNEL, messageId: copy })).toBe(false);
    }
    expect(cell.get()).toEqual(home);
    expect(s.runtime.registry.has(home)).toBe(true);
    expect(s.runtime.registry.size).toBe(1);
    expect(s.client.reactionsOn(home)).toEqual([PREVIOUS_PAGE_EMOJI, CLOSE_MENU_EMOJI, NEXT_PAGE_EMOJI]);

    await s.runtime.sweeper.sweep();
    expect(cell.get()).toEqual({ channelId: CHANNEL, messageId: '1000000000000000005' });
    expect(s.client.exists(home)).toBe(false);
  });

  it('logs a copy that could not be deleted after a failed relocation', async () => {
    const s = setup();
    const cell = await threePages().sticky().build(s.ctx, CHANNEL);
    s.client.postAs('77', CHANNEL, { content: 'chatter' });
    const reactErr = new Error('Rate limited');
    const deleteErr = new Error('Unknown Channel');
    s.client.failNext('addReaction', reactErr);
    s.client.failNext('deleteMessage', deleteErr);

    await s.runtime.sweeper.sweep();

    expect(s.log.error).toHaveBeenCalledWith(
      { err: deleteErr, channelId: CHANNEL, messageId: '1000000000000000002' },
      'menu:failed to delete unregistered copy',
    );
    expect(s.log.error).toHaveBeenCalledWith({ err: reactErr, ...cell.get() }, 'sweeper:tick failed');
    expect(s.runtime.registry.has(cell.get())).toBe(true);
  });
});
