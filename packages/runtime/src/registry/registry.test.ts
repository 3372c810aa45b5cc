// Tests for PageRegistry - the operation boundary

import { describe, it, expect, vi } from 'vitest';
import type { Address, PageEvent } from '@quire/protocol';
import { memory } from '@quire/repositories';
import { createPageRegistry, type PageRegistry } from './registry.js';
import type { CreatePageInput, OwnershipInput } from './pages.js';
import { RuntimeError } from '../errors.js';
import { createCapturingLogger } from '../logger.js';
import { createInMemoryPayoutGateway, type InMemoryPayoutGatewayOptions } from '../treasury/payouts.js';
import { createFixedEntropy } from '../treasury/entropy.js';

// --- Test Fixtures ---

const CLOCK = new Date('2024-03-01T12:00:00.000Z');

function setup(payoutOptions: InMemoryPayoutGatewayOptions = {}) {
  const repos = memory.createInMemoryRepositoryContext();
  const payouts = createInMemoryPayoutGateway(payoutOptions);
  const logger = createCapturingLogger();
  const events: PageEvent[] = [];
  const registry = createPageRegistry({
    repos,
    payouts,
    logger,
    entropy: createFixedEntropy({ recentDigest: 'ab', timestamp: 1700000000 }),
    clock: () => CLOCK,
    config: { onEvent: (event) => void events.push(event) },
  });
  return { repos, payouts, logger, events, registry };
}

function pageInput(ownership: OwnershipInput, overrides: Partial<CreatePageInput> = {}): CreatePageInput {
  return {
    name: 'Home',
    thumbnail: 'https://example.com/home.png',
    content: '<html><p>v1</p></html>',
    ownership,
    updateFee: 1000n,
    ...overrides,
  };
}

const single = (owner: Address): OwnershipInput => ({ kind: 'single', owners: [owner], threshold: 1 });
const OPEN: OwnershipInput = { kind: 'permissionless', owners: [], threshold: 0 };

async function failureCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RuntimeError) return error.code;
    throw error;
  }
  throw new Error('expected the operation to fail');
}

// --- Scenarios ---

describe('single-owner page lifecycle', () => {
  it('collects a fee, executes on approval and pays the owner', async () => {
    const { registry, payouts } = setup();
    const page = await registry.createPage('0xowner', pageInput(single('0xowner')));
    expect(page.id).toBe(1);

    expect(
      await failureCode(
        registry.requestUpdate('0xu', { pageId: 1, proposed: { content: '<html>v2</html>' }, paidFee: 999n })
      )
    ).toBe('INSUFFICIENT_FEE');
    expect(await registry.getBalance(1)).toBe(0n);

    const submitted = await registry.requestUpdate('0xu', {
      pageId: 1,
      proposed: { content: '<html>v2</html>' },
      paidFee: 1000n,
    });
    expect(submitted.request.id).toBe(0);
    expect(submitted.request.executed).toBe(false);
    expect(await registry.getBalance(1)).toBe(1000n);

    const approved = await registry.approveRequest('0xowner', { pageId: 1, requestId: 0 });
    expect(approved.executed).toBe(true);
    expect(await registry.getCurrentContent(1)).toBe('<html>v2</html>');
    expect((await registry.getUpdateRequest(1, 0)).executed).toBe(true);
    expect(await registry.getBalance(1)).toBe(1000n);

    const withdrawn = await registry.withdrawPageFees('0xowner', { pageId: 1 });
    expect(withdrawn.amount).toBe(1000n);
    expect(await registry.getBalance(1)).toBe(0n);
    expect(payouts.balanceOf('0xowner')).toBe(1000n);
  });
});

describe('multisig page lifecycle', () => {
  it('executes on the threshold approval and never again', async () => {
    const { registry } = setup();
    await registry.createPage(
      '0xcreator',
      pageInput({ kind: 'multisig', owners: ['0xa', '0xb', '0xc'], threshold: 2 })
    );
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'Renamed' }, paidFee: 1000n });

    const first = await registry.approveRequest('0xa', { pageId: 1, requestId: 0 });
    expect(first.executed).toBe(false);
    expect((await registry.getPageInfo(1)).name).toBe('Home');

    const second = await registry.approveRequest('0xb', { pageId: 1, requestId: 0 });
    expect(second.executed).toBe(true);
    expect((await registry.getPageInfo(1)).name).toBe('Renamed');

    expect(await failureCode(registry.approveRequest('0xc', { pageId: 1, requestId: 0 }))).toBe(
      'ALREADY_EXECUTED'
    );
    expect((await registry.getUpdateRequest(1, 0)).approvals).toBe(2);
  });

  it('splits a withdrawal evenly and retains the remainder', async () => {
    const { registry, payouts } = setup();
    await registry.createPage(
      '0xcreator',
      pageInput({ kind: 'multisig', owners: ['0xa', '0xb', '0xc'], threshold: 2 }, { updateFee: 100n })
    );
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 100n });

    const result = await registry.withdrawPageFees('0xb', { pageId: 1 });

    expect(result.retained).toBe(1n);
    expect(await registry.getTreasury(1)).toEqual({
      pageId: 1,
      balance: 0n,
      retained: 1n,
      collected: 100n,
      paidOut: 99n,
    });
    expect(['0xa', '0xb', '0xc'].map((o) => payouts.balanceOf(o))).toEqual([33n, 33n, 33n]);
  });

  it('refuses withdrawal by a non-owner', async () => {
    const { registry } = setup();
    await registry.createPage('0xcreator', pageInput({ kind: 'multisig', owners: ['0xa', '0xb'], threshold: 1 }));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 1000n });

    expect(await failureCode(registry.withdrawPageFees('0xcreator', { pageId: 1 }))).toBe('UNAUTHORIZED');
    expect(await registry.getBalance(1)).toBe(1000n);
  });
});

describe('permissionless page lifecycle', () => {
  it('applies each submission, records participants and distributes the balance', async () => {
    const { registry, payouts } = setup();
    await registry.createPage('0xcreator', pageInput(OPEN, { updateFee: 10n }));

    await registry.requestUpdate('0xu', { pageId: 1, proposed: { content: '<html>u</html>' }, paidFee: 10n });
    await registry.requestUpdate('0xv', { pageId: 1, proposed: { content: '<html>v</html>' }, paidFee: 15n });
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'By u' }, paidFee: 10n });

    expect(await registry.getCurrentContent(1)).toBe('<html>v</html>');
    expect(await registry.getParticipants(1)).toEqual(['0xu', '0xv']);
    expect(await registry.getBalance(1)).toBe(35n);

    expect(await failureCode(registry.withdrawPageFees('0xu', { pageId: 1 }))).toBe('NOT_WITHDRAWABLE');

    const result = await registry.distributePageTreasury('0xd', { pageId: 1 });
    expect(result.amount).toBe(35n);
    expect(await registry.getBalance(1)).toBe(0n);
    expect(payouts.balanceOf(result.winner)).toBe(35n);
    expect(['0xu', '0xv']).toContain(result.winner);
  });

  it('picks the winner from the entropy sample', async () => {
    const { registry } = setup();
    await registry.createPage('0xcreator', pageInput(OPEN, { updateFee: 10n }));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'a' }, paidFee: 10n });
    await registry.requestUpdate('0xv', { pageId: 1, proposed: { name: 'b' }, paidFee: 15n });

    const result = await registry.distributePageTreasury('0xd', { pageId: 1 });

    expect(result.winner).toBe('0xv');
  });

  it('keeps fee and ledger unchanged on an underpaid submission', async () => {
    const { registry } = setup();
    await registry.createPage('0xcreator', pageInput(OPEN, { updateFee: 10n }));

    expect(
      await failureCode(registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'a' }, paidFee: 9n }))
    ).toBe('INSUFFICIENT_FEE');
    expect(await registry.getParticipants(1)).toEqual([]);
    expect(await registry.getBalance(1)).toBe(0n);
    expect((await registry.getPageInfo(1)).name).toBe('Home');
  });

  it('reports the distribution preconditions in order', async () => {
    const { registry } = setup();
    await registry.createPage('0xcreator', pageInput(single('0xowner')));
    await registry.createPage('0xcreator', pageInput(OPEN, { updateFee: 0n }));

    expect(await failureCode(registry.distributePageTreasury('0xd', { pageId: 1 }))).toBe('NOT_PERMISSIONLESS');
    expect(await failureCode(registry.distributePageTreasury('0xd', { pageId: 2 }))).toBe(
      'NOTHING_TO_DISTRIBUTE'
    );
    expect(await failureCode(registry.distributePageTreasury('0xd', { pageId: 3 }))).toBe('PAGE_NOT_FOUND');
  });

  it('rejects approvals with APPROVAL_NOT_APPLICABLE once a page turns permissionless', async () => {
    const { registry } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner')));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 1000n });
    await registry.changeOwnership('0xowner', { pageId: 1, ...OPEN });

    expect(await failureCode(registry.approveRequest('0xowner', { pageId: 1, requestId: 0 }))).toBe(
      'APPROVAL_NOT_APPLICABLE'
    );
  });
});

describe('page creation', () => {
  it('allocates ids only for successful creations', async () => {
    const { registry } = setup();

    expect(await failureCode(registry.createPage('0xa', pageInput(single('0xa'), { name: '' })))).toBe(
      'EMPTY_FIELD'
    );
    expect(
      await failureCode(registry.createPage('0xa', pageInput({ kind: 'single', owners: [], threshold: 1 })))
    ).toBe('INVALID_CONFIG');
    expect(await failureCode(registry.createPage('0xa', pageInput({ kind: 'club', owners: [], threshold: 0 })))).toBe(
      'INVALID_VARIANT'
    );
    expect(await failureCode(registry.createPage('0xa', pageInput(single('0xa'), { updateFee: -1n })))).toBe(
      'INVALID_FEE'
    );
    expect(await failureCode(registry.createPage('0xa', pageInput(single('0xa'), { content: 'plain' })))).toBe(
      'INVALID_CONTENT_FORMAT'
    );
    expect(await registry.getPageCount()).toBe(0);

    const first = await registry.createPage('0xa', pageInput(single('0xa')));
    const second = await registry.createPage('0xa', pageInput(single('0xa')));
    expect([first.id, second.id]).toEqual([1, 2]);
    expect(await registry.getPageCount()).toBe(2);
  });

  it('returns a page info projection', async () => {
    const { registry } = setup();
    await registry.createPage('0xcreator', pageInput(single('0xowner'), { immutable: true }));

    expect(await registry.getPageInfo(1)).toEqual({
      id: 1,
      name: 'Home',
      thumbnail: 'https://example.com/home.png',
      content: '<html><p>v1</p></html>',
      immutable: true,
      updateFee: 1000n,
      creator: '0xcreator',
      requestCount: 0,
      likes: 0,
      dislikes: 0,
      createdAt: expect.any(String),
      updatedAt: expect.any(String),
      ownershipKind: 'single',
      owners: ['0xowner'],
      threshold: 1,
      balance: 0n,
    });
    expect(await registry.getOwners(1)).toEqual(['0xowner']);
  });

  it('freezes immutable pages', async () => {
    const { registry } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner'), { immutable: true }));

    expect(
      await failureCode(registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 1000n }))
    ).toBe('PAGE_FROZEN');
  });

  it('fails reads for unknown pages', async () => {
    const { registry } = setup();

    expect(await failureCode(registry.getPageInfo(1))).toBe('PAGE_NOT_FOUND');
    expect(await failureCode(registry.getBalance(0))).toBe('PAGE_NOT_FOUND');
    expect(await failureCode(registry.getOwners(-1))).toBe('PAGE_NOT_FOUND');
  });

  it('requires a caller', async () => {
    const { registry } = setup();
    expect(await failureCode(registry.createPage('', pageInput(single('0xa'))))).toBe('EMPTY_FIELD');
  });
});

describe('changeOwnership', () => {
  it('lets the single owner move to multisig exactly once', async () => {
    const { registry, events } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner')));

    expect(
      await failureCode(
        registry.changeOwnership('0xstranger', { pageId: 1, kind: 'multisig', owners: ['0xa'], threshold: 1 })
      )
    ).toBe('UNAUTHORIZED');

    const page = await registry.changeOwnership('0xowner', {
      pageId: 1,
      kind: 'multisig',
      owners: ['0xa', '0xb'],
      threshold: 2,
    });
    expect(page.ownership).toEqual({ kind: 'multisig', owners: ['0xa', '0xb'], threshold: 2 });
    expect(events.at(-1)?.payload).toEqual({ from: 'single', to: 'multisig', owners: ['0xa', '0xb'], threshold: 2 });

    expect(
      await failureCode(registry.changeOwnership('0xa', { pageId: 1, kind: 'single', owners: ['0xa'], threshold: 1 }))
    ).toBe('TRANSITION_NOT_ALLOWED');
    expect(await registry.getOwners(1)).toEqual(['0xa', '0xb']);
  });

  it('reports TRANSITION_NOT_ALLOWED before checking the caller', async () => {
    const { registry } = setup();
    await registry.createPage('0xcreator', pageInput(OPEN));

    expect(
      await failureCode(registry.changeOwnership('0xanyone', { pageId: 1, ...single('0xanyone') }))
    ).toBe('TRANSITION_NOT_ALLOWED');
  });

  it('validates the new configuration after authorization', async () => {
    const { registry } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner')));

    expect(
      await failureCode(registry.changeOwnership('0xowner', { pageId: 1, kind: 'multisig', owners: [], threshold: 1 }))
    ).toBe('INVALID_CONFIG');
    expect(await registry.getOwners(1)).toEqual(['0xowner']);
  });
});

describe('payout atomicity', () => {
  it('rolls back a withdrawal whose payout is rejected', async () => {
    const { registry, events, logger } = setup({ rejecting: ['0xowner'] });
    await registry.createPage('0xowner', pageInput(single('0xowner')));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 1000n });

    expect(await failureCode(registry.withdrawPageFees('0xowner', { pageId: 1 }))).toBe('TRANSFER_FAILED');

    expect(await registry.getTreasury(1)).toEqual({
      pageId: 1,
      balance: 1000n,
      retained: 0n,
      collected: 1000n,
      paidOut: 0n,
    });
    expect(events.map((e) => e.type)).toEqual(['page.created', 'update.requested']);
    expect(logger.entries.filter((e) => e.level === 'warn').map((e) => e.message)).toEqual([
      'Payout rejected',
      'withdrawPageFees failed',
    ]);
  });

  it('rolls back a distribution whose payout is rejected', async () => {
    const { registry, payouts } = setup();
    await registry.createPage('0xcreator', pageInput(OPEN, { updateFee: 10n }));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'a' }, paidFee: 10n });
    payouts.reject('0xu');

    expect(await failureCode(registry.distributePageTreasury('0xd', { pageId: 1 }))).toBe('TRANSFER_FAILED');
    expect(await registry.getBalance(1)).toBe(10n);
  });

  it('shows a re-entrant recipient the zeroed balance', async () => {
    let registry: PageRegistry | undefined;
    const reentryCodes: string[] = [];
    const fixture = setup({
      onTransfer: async () => {
        if (!registry) return;
        reentryCodes.push(await failureCode(registry.withdrawPageFees('0xowner', { pageId: 1 })));
      },
    });
    registry = fixture.registry;

    await registry.createPage('0xowner', pageInput(single('0xowner')));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 1000n });
    await registry.withdrawPageFees('0xowner', { pageId: 1 });

    expect(reentryCodes).toEqual(['NOTHING_TO_WITHDRAW']);
    expect(fixture.payouts.balanceOf('0xowner')).toBe(1000n);
    expect(await registry.getBalance(1)).toBe(0n);
  });

  it('plans withdrawals and distributions from the locked treasury read', async () => {
    const { registry, repos } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner')));
    await registry.createPage('0xcreator', pageInput(OPEN, { updateFee: 10n }));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 1000n });
    await registry.requestUpdate('0xu', { pageId: 2, proposed: { name: 'y' }, paidFee: 10n });
    const locked = vi.spyOn(repos.treasuries, 'getForUpdate');

    await registry.withdrawPageFees('0xowner', { pageId: 1 });
    await registry.distributePageTreasury('0xd', { pageId: 2 });

    expect(locked.mock.calls).toEqual([[1], [2]]);
  });

  it('reports NOTHING_TO_WITHDRAW before NOT_WITHDRAWABLE', async () => {
    const { registry } = setup();
    await registry.createPage('0xcreator', pageInput(OPEN));

    expect(await failureCode(registry.withdrawPageFees('0xcreator', { pageId: 1 }))).toBe('NOTHING_TO_WITHDRAW');
  });
});

describe('serialization', () => {
  it('answers reads from committed state while a payout is pending', async () => {
    let reached = () => {};
    let release = () => {};
    const inPayout = new Promise<void>((resolve) => {
      reached = () => resolve();
    });
    const held = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const { registry } = setup({
      onTransfer: async () => {
        reached();
        await held;
        throw new Error('recipient offline');
      },
    });
    await registry.createPage('0xowner', pageInput(single('0xowner')));
    await registry.requestUpdate('0xu', { pageId: 1, proposed: { name: 'x' }, paidFee: 1000n });

    const withdrawal = failureCode(registry.withdrawPageFees('0xowner', { pageId: 1 }));
    await inPayout;
    const balance = registry.getBalance(1);
    const treasury = registry.getTreasury(1);
    release();

    expect(await withdrawal).toBe('TRANSFER_FAILED');
    expect(await balance).toBe(1000n);
    expect(await treasury).toMatchObject({ balance: 1000n, paidOut: 0n });
  });

  it('gives concurrent submissions distinct sequence numbers', async () => {
    const { registry } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner')));

    const results = await Promise.all(
      ['0xu', '0xv', '0xw'].map((caller) =>
        registry.requestUpdate(caller, { pageId: 1, proposed: { name: caller }, paidFee: 1000n })
      )
    );

    expect(results.map((r) => r.request.id).sort()).toEqual([0, 1, 2]);
    expect(await registry.getBalance(1)).toBe(3000n);
    expect((await registry.listUpdateRequests(1, { status: ['pending'] })).length).toBe(3);
  });
});

describe('events', () => {
  it('publishes stamped events after commit', async () => {
    const { registry, events } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner')));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'page.created',
      pageId: 1,
      timestamp: '2024-03-01T12:00:00.000Z',
      payload: { creator: '0xowner', name: 'Home', ownershipKind: 'single', updateFee: 1000n, immutable: false },
    });
    expect(events[0].id).toMatch(/^evt_\d+_1$/);
  });

  it('advances the digest only on commit', async () => {
    const { registry } = setup();
    const initial = registry.recentDigest;

    await failureCode(registry.createPage('0xa', pageInput(single('0xa'), { name: '' })));
    expect(registry.recentDigest).toBe(initial);

    await registry.createPage('0xa', pageInput(single('0xa')));
    expect(registry.recentDigest).not.toBe(initial);
  });

  it('keeps the operation when a subscriber throws', async () => {
    const repos = memory.createInMemoryRepositoryContext();
    const logger = createCapturingLogger();
    const registry = createPageRegistry({
      repos,
      payouts: createInMemoryPayoutGateway(),
      logger,
      config: {
        onEvent: () => {
          throw new Error('subscriber down');
        },
      },
    });

    const page = await registry.createPage('0xa', pageInput(single('0xa')));

    expect(page.id).toBe(1);
    expect(logger.entries.find((e) => e.level === 'error')).toMatchObject({
      message: 'Event handler failed',
      data: { type: 'page.created', error: 'subscriber down' },
    });
  });
});

describe('vote', () => {
  it('toggles reactions and keeps the tally', async () => {
    const { registry } = setup();
    await registry.createPage('0xowner', pageInput(single('0xowner')));

    await registry.vote('0xu', { pageId: 1, kind: 'like' });
    await registry.vote('0xv', { pageId: 1, kind: 'like' });
    const switched = await registry.vote('0xu', { pageId: 1, kind: 'dislike' });

    expect(switched).toEqual({ state: { liked: false, disliked: true }, tally: { likes: 1, dislikes: 1 } });
    expect(await registry.getReaction(1, '0xu')).toEqual({ liked: false, disliked: true });
    expect(await registry.getReaction(1, '0xw')).toEqual({ liked: false, disliked: false });

    const info = await registry.getPageInfo(1);
    expect([info.likes, info.dislikes]).toEqual([1, 1]);
  });
});
