// Tests for the update request pipeline

import { describe, it, expect, vi } from 'vitest';
import type { Address, OwnershipConfig, Page } from '@quire/protocol';
import { createContentValidator, DEFAULT_CONTENT_FORMAT, MAX_AMOUNT } from '@quire/protocol';
import { memory } from '@quire/repositories';
import { approveUpdate, normalizeFields, submitUpdate } from './pipeline.js';
import { RuntimeError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { createInMemoryPayoutGateway } from '../treasury/payouts.js';
import { createFixedEntropy } from '../treasury/entropy.js';
import type { OperationContext, PageEventDraft } from '../registry/context.js';

// --- Test Fixtures ---

const NOW = '2024-01-01T00:00:00.000Z';
const HTML = '<html><p>v2</p></html>';

function setup() {
  const repos = memory.createInMemoryRepositoryContext();
  const events: PageEventDraft[] = [];

  const ctxFor = (caller: Address): OperationContext => ({
    repos,
    caller,
    timestamp: NOW,
    content: createContentValidator(DEFAULT_CONTENT_FORMAT),
    payouts: createInMemoryPayoutGateway(),
    entropy: createFixedEntropy({ recentDigest: 'ab', timestamp: 0 }),
    logger: silentLogger,
    emit: (event) => events.push(event),
  });

  async function seedPage(
    ownership: OwnershipConfig,
    overrides: { updateFee?: bigint; immutable?: boolean } = {}
  ): Promise<Page> {
    const page = await repos.pages.create({
      name: 'Home',
      thumbnail: 'https://example.com/home.png',
      content: '<html><p>v1</p></html>',
      immutable: overrides.immutable ?? false,
      updateFee: overrides.updateFee ?? 100n,
      ownership,
      creator: '0xcreator',
    });
    await repos.treasuries.open(page.id);
    return page;
  }

  return { repos, events, ctxFor, seedPage };
}

const SINGLE: OwnershipConfig = { kind: 'single', owners: ['0xowner'], threshold: 1 };
const MULTISIG: OwnershipConfig = { kind: 'multisig', owners: ['0xa', '0xb', '0xc'], threshold: 2 };
const OPEN: OwnershipConfig = { kind: 'permissionless', owners: [], threshold: 0 };

async function failureCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RuntimeError) return error.code;
    throw error;
  }
  throw new Error('expected the operation to fail');
}

// --- Tests ---

describe('normalizeFields', () => {
  it('drops empty and absent fields', () => {
    expect(normalizeFields({ content: '', name: 'New', thumbnail: undefined })).toEqual({ name: 'New' });
  });
});

describe('submitUpdate', () => {
  it('fails with PAGE_NOT_FOUND for an unknown page', async () => {
    const { ctxFor } = setup();
    expect(
      await failureCode(submitUpdate(ctxFor('0xu'), { pageId: 9, proposed: { name: 'x' }, paidFee: 100n }))
    ).toBe('PAGE_NOT_FOUND');
  });

  it('fails with PAGE_FROZEN before looking at the fee', async () => {
    const { ctxFor, seedPage } = setup();
    const page = await seedPage(SINGLE, { immutable: true });

    expect(
      await failureCode(submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: {}, paidFee: 0n }))
    ).toBe('PAGE_FROZEN');
  });

  it('fails with INSUFFICIENT_FEE before checking the fields', async () => {
    const { ctxFor, seedPage, repos } = setup();
    const page = await seedPage(SINGLE);

    expect(
      await failureCode(submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: {}, paidFee: 99n }))
    ).toBe('INSUFFICIENT_FEE');
    expect((await repos.treasuries.get(page.id))?.balance).toBe(0n);
  });

  it('fails with EMPTY_UPDATE when every field is empty', async () => {
    const { ctxFor, seedPage } = setup();
    const page = await seedPage(SINGLE);

    expect(
      await failureCode(
        submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { content: '', name: '' }, paidFee: 100n })
      )
    ).toBe('EMPTY_UPDATE');
  });

  it('checks content before thumbnail', async () => {
    const { ctxFor, seedPage } = setup();
    const page = await seedPage(SINGLE);

    try {
      await submitUpdate(ctxFor('0xu'), {
        pageId: page.id,
        proposed: { content: 'plain text', thumbnail: 'ftp://x' },
        paidFee: 100n,
      });
      expect.fail('expected submission to fail');
    } catch (error) {
      expect(error).toMatchObject({ code: 'INVALID_CONTENT_FORMAT', field: 'content' });
    }
  });

  it('rejects a bad thumbnail', async () => {
    const { ctxFor, seedPage } = setup();
    const page = await seedPage(SINGLE);

    try {
      await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { thumbnail: 'ftp://x' }, paidFee: 100n });
      expect.fail('expected submission to fail');
    } catch (error) {
      expect(error).toMatchObject({ code: 'INVALID_CONTENT_FORMAT', field: 'thumbnail' });
    }
  });

  it('fails with INVALID_FEE when the treasury total would leave the 64-bit range', async () => {
    const { ctxFor, seedPage, repos } = setup();
    const page = await seedPage(SINGLE, { updateFee: 1n });
    await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { name: 'a' }, paidFee: MAX_AMOUNT - 1n });

    expect(
      await failureCode(submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { name: 'b' }, paidFee: 2n }))
    ).toBe('INVALID_FEE');
    expect((await repos.treasuries.get(page.id))?.balance).toBe(MAX_AMOUNT - 1n);
    expect(await repos.updateRequests.list(page.id)).toHaveLength(1);
  });

  it('stores a pending request under the next sequence number and credits the full amount', async () => {
    const { ctxFor, seedPage, repos, events } = setup();
    const page = await seedPage(SINGLE);

    const first = await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { content: HTML }, paidFee: 150n });
    const second = await submitUpdate(ctxFor('0xv'), { pageId: page.id, proposed: { name: 'Renamed' }, paidFee: 100n });

    expect(first.executedImmediately).toBe(false);
    expect(first.request).toMatchObject({ id: 0, executed: false, approvals: 0, proposer: '0xu', fee: 150n });
    expect(second.request.id).toBe(1);
    expect((await repos.treasuries.get(page.id))?.balance).toBe(250n);
    expect((await repos.pages.get(page.id))?.content).toBe('<html><p>v1</p></html>');
    expect(events.map((e) => e.type)).toEqual(['update.requested', 'update.requested']);
  });

  it('applies permissionless submissions at once and records the caller', async () => {
    const { ctxFor, seedPage, repos, events } = setup();
    const page = await seedPage(OPEN, { updateFee: 10n });

    const result = await submitUpdate(ctxFor('0xu'), {
      pageId: page.id,
      proposed: { content: HTML, name: '' },
      paidFee: 10n,
    });

    expect(result.executedImmediately).toBe(true);
    expect(result.request).toEqual({
      pageId: page.id,
      id: 0,
      proposed: { content: HTML },
      proposer: '0xu',
      fee: 10n,
      executed: true,
      approvals: 0,
      voters: [],
      createdAt: NOW,
      executedAt: NOW,
    });
    const stored = await repos.pages.get(page.id);
    expect(stored?.content).toBe(HTML);
    expect(stored?.name).toBe('Home');
    expect(stored?.requestCount).toBe(0);
    expect(await repos.participants.list(page.id)).toEqual(['0xu']);
    expect(events).toEqual([
      {
        type: 'update.executed',
        pageId: page.id,
        payload: { requestId: 0, fields: { content: HTML }, executor: '0xu' },
      },
    ]);
  });
});

describe('approveUpdate', () => {
  it('executes a single-owner request on the owner approval', async () => {
    const { ctxFor, seedPage, repos } = setup();
    const page = await seedPage(SINGLE);
    await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { content: HTML }, paidFee: 100n });

    const result = await approveUpdate(ctxFor('0xowner'), { pageId: page.id, requestId: 0 });

    expect(result.executed).toBe(true);
    expect(result.request).toMatchObject({ executed: true, approvals: 1, voters: ['0xowner'], executedAt: NOW });
    expect((await repos.pages.get(page.id))?.content).toBe(HTML);
  });

  it('fails with INVALID_REQUEST for an unknown request id', async () => {
    const { ctxFor, seedPage } = setup();
    const page = await seedPage(SINGLE);

    expect(await failureCode(approveUpdate(ctxFor('0xowner'), { pageId: page.id, requestId: 0 }))).toBe(
      'INVALID_REQUEST'
    );
  });

  it('rejects approvals from non-owners', async () => {
    const { ctxFor, seedPage } = setup();
    const page = await seedPage(SINGLE);
    await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { name: 'x' }, paidFee: 100n });

    expect(await failureCode(approveUpdate(ctxFor('0xu'), { pageId: page.id, requestId: 0 }))).toBe('UNAUTHORIZED');
  });

  it('waits for the multisig threshold of distinct voters', async () => {
    const { ctxFor, seedPage, repos, events } = setup();
    const page = await seedPage(MULTISIG);
    await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { content: HTML }, paidFee: 100n });

    const first = await approveUpdate(ctxFor('0xa'), { pageId: page.id, requestId: 0 });
    expect(first.executed).toBe(false);
    expect((await repos.pages.get(page.id))?.content).toBe('<html><p>v1</p></html>');

    expect(await failureCode(approveUpdate(ctxFor('0xa'), { pageId: page.id, requestId: 0 }))).toBe(
      'DUPLICATE_VOTE'
    );

    const second = await approveUpdate(ctxFor('0xb'), { pageId: page.id, requestId: 0 });
    expect(second.executed).toBe(true);
    expect(second.request.voters).toEqual(['0xa', '0xb']);
    expect((await repos.pages.get(page.id))?.content).toBe(HTML);

    expect(await failureCode(approveUpdate(ctxFor('0xc'), { pageId: page.id, requestId: 0 }))).toBe(
      'ALREADY_EXECUTED'
    );
    expect(events.map((e) => e.type)).toEqual([
      'update.requested',
      'approval.recorded',
      'approval.recorded',
      'update.executed',
    ]);
  });

  it('checks ALREADY_EXECUTED before authorization', async () => {
    const { ctxFor, seedPage } = setup();
    const page = await seedPage(SINGLE);
    await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { name: 'x' }, paidFee: 100n });
    await approveUpdate(ctxFor('0xowner'), { pageId: page.id, requestId: 0 });

    expect(await failureCode(approveUpdate(ctxFor('0xstranger'), { pageId: page.id, requestId: 0 }))).toBe(
      'ALREADY_EXECUTED'
    );
  });

  it('reads the request through the locking read', async () => {
    const { ctxFor, seedPage, repos } = setup();
    const page = await seedPage(SINGLE);
    await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { name: 'x' }, paidFee: 100n });
    const locked = vi.spyOn(repos.updateRequests, 'getForUpdate');

    await approveUpdate(ctxFor('0xowner'), { pageId: page.id, requestId: 0 });

    expect(locked).toHaveBeenCalledWith(page.id, 0);
  });

  it('fails with ALREADY_EXECUTED when another approval executed the request first', async () => {
    const { ctxFor, seedPage, repos, events } = setup();
    const page = await seedPage({ kind: 'multisig', owners: ['0xa', '0xb'], threshold: 1 });
    await submitUpdate(ctxFor('0xu'), { pageId: page.id, proposed: { content: HTML }, paidFee: 100n });
    const pending = await repos.updateRequests.get(page.id, 0);
    if (!pending) throw new Error('request 0 was not stored');

    await approveUpdate(ctxFor('0xa'), { pageId: page.id, requestId: 0 });
    // 0xb decided on the copy it read before 0xa's approval landed
    vi.spyOn(repos.updateRequests, 'getForUpdate').mockResolvedValueOnce(pending);

    expect(await failureCode(approveUpdate(ctxFor('0xb'), { pageId: page.id, requestId: 0 }))).toBe(
      'ALREADY_EXECUTED'
    );
    expect(events.filter((e) => e.type === 'update.executed')).toHaveLength(1);
  });
});
