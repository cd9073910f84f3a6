import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../src/types/errors.js';
import { closeDb } from '../src/services/database.js';
import { createTestWarehouse, seedPolicy, T0, type TestWarehouse } from './helpers.js';

describe('lifecycle services', () => {
  let ctx: TestWarehouse;

  beforeEach(async () => {
    ctx = await createTestWarehouse();
  });

  afterEach(async () => {
    await closeDb(ctx.db);
  });

  describe('UserService', () => {
    it('creates and fetches a user', async () => {
      const user = await ctx.warehouse.users.create('Grace Hopper', 'grace@example.com');

      expect(user).toEqual({ id: 1, name: 'Grace Hopper', email: 'grace@example.com' });
      expect(await ctx.warehouse.users.getById(1)).toEqual(user);
    });

    it('returns undefined for a missing user', async () => {
      expect(await ctx.warehouse.users.getById(42)).toBeUndefined();
      expect(await ctx.warehouse.users.exists(42)).toBe(false);
    });

    it('updates only the provided fields', async () => {
      const user = await ctx.warehouse.users.create('Grace Hopper', 'grace@example.com');

      const updated = await ctx.warehouse.users.update(user.id, { name: 'Grace B Hopper' });

      expect(updated).toEqual({ id: user.id, name: 'Grace B Hopper', email: 'grace@example.com' });
      expect(await ctx.warehouse.users.update(99, { name: 'Nobody' })).toBeUndefined();
    });

    it('deletes a user without touching their quotes', async () => {
      const user = await ctx.warehouse.users.create('Grace Hopper', null);
      await ctx.warehouse.quotes.create(user.id);

      expect(await ctx.warehouse.users.delete(user.id)).toBe(true);
      expect(await ctx.warehouse.users.delete(user.id)).toBe(false);
      expect(await ctx.warehouse.quotes.listByUser(user.id)).toHaveLength(1);
    });

    it('deletes a user who holds a policy and leaves the policy in place', async () => {
      const { userId, policyId } = await seedPolicy(ctx.warehouse);

      expect(await ctx.warehouse.users.delete(userId)).toBe(true);
      expect(await ctx.warehouse.users.getById(userId)).toBeUndefined();
      expect((await ctx.warehouse.policies.getById(policyId))?.user_id).toBe(userId);
    });
  });

  describe('QuoteService', () => {
    it('stamps new quotes with the clock and leaves them unbound', async () => {
      const user = await ctx.warehouse.users.create('Alan Turing', null);

      const quote = await ctx.warehouse.quotes.create(user.id);

      expect(quote).toEqual({
        id: 1,
        user_id: user.id,
        create_time: T0,
        bind_time: null,
        bindable: true,
      });
    });

    it('returns undefined when the user does not exist', async () => {
      expect(await ctx.warehouse.quotes.create(7)).toBeUndefined();
      expect(await ctx.warehouse.quotes.listAll()).toEqual([]);
    });

    it('binds a bindable quote exactly once', async () => {
      const user = await ctx.warehouse.users.create('Alan Turing', null);
      const quote = await ctx.warehouse.quotes.create(user.id);
      if (!quote) throw new Error('quote missing');

      ctx.clock.advance(60);
      const bound = await ctx.warehouse.quotes.bind(quote.id);

      expect(bound?.bind_time).toBe('2024-01-01T00:01:00.000Z');
      expect(bound && ctx.warehouse.quotes.isBound(bound)).toBe(true);
      await expect(ctx.warehouse.quotes.bind(quote.id)).rejects.toThrow('Quote is already bound');
    });

    it('refuses to bind a non-bindable quote', async () => {
      const user = await ctx.warehouse.users.create('Alan Turing', null);
      const quote = await ctx.warehouse.quotes.create(user.id, false);
      if (!quote) throw new Error('quote missing');

      await expect(ctx.warehouse.quotes.bind(quote.id)).rejects.toThrow(ValidationError);
      await expect(ctx.warehouse.quotes.bind(quote.id)).rejects.toThrow('Quote is not bindable');
      expect((await ctx.warehouse.quotes.getById(quote.id))?.bind_time).toBeNull();
    });

    it('returns undefined when binding a missing quote', async () => {
      expect(await ctx.warehouse.quotes.bind(5)).toBeUndefined();
    });

    it('lists only bindable, unbound quotes as bindable', async () => {
      const user = await ctx.warehouse.users.create('Alan Turing', null);
      const open = await ctx.warehouse.quotes.create(user.id);
      const closed = await ctx.warehouse.quotes.create(user.id, false);
      const bound = await ctx.warehouse.quotes.create(user.id);
      if (!open || !closed || !bound) throw new Error('quote missing');
      await ctx.warehouse.quotes.bind(bound.id);

      const bindable = await ctx.warehouse.quotes.listBindable();

      expect(bindable.map((quote) => quote.id)).toEqual([open.id]);
    });
  });

  describe('PolicyService', () => {
    it('creates a policy from a bound quote of the same user', async () => {
      const { userId, quoteId, policyId } = await seedPolicy(ctx.warehouse);

      expect(await ctx.warehouse.policies.getById(policyId)).toEqual({
        id: policyId,
        user_id: userId,
        quote_id: quoteId,
      });
      expect(await ctx.warehouse.policies.getByQuote(quoteId)).toEqual({
        id: policyId,
        user_id: userId,
        quote_id: quoteId,
      });
    });

    it('rejects missing users and quotes with NotFoundError', async () => {
      const user = await ctx.warehouse.users.create('Alan Turing', null);

      await expect(ctx.warehouse.policies.create(99, 1)).rejects.toThrow(NotFoundError);
      await expect(ctx.warehouse.policies.create(user.id, 99)).rejects.toThrow(NotFoundError);
    });

    it("rejects another user's quote", async () => {
      const owner = await ctx.warehouse.users.create('Alan Turing', null);
      const other = await ctx.warehouse.users.create('Grace Hopper', null);
      const quote = await ctx.warehouse.quotes.create(owner.id);
      if (!quote) throw new Error('quote missing');
      await ctx.warehouse.quotes.bind(quote.id);

      await expect(ctx.warehouse.policies.create(other.id, quote.id)).rejects.toThrow(
        'Quote does not belong to the specified user'
      );
    });

    it('rejects an unbound quote', async () => {
      const user = await ctx.warehouse.users.create('Alan Turing', null);
      const quote = await ctx.warehouse.quotes.create(user.id);
      if (!quote) throw new Error('quote missing');

      await expect(ctx.warehouse.policies.create(user.id, quote.id)).rejects.toThrow(
        'Quote must be bound before creating a policy'
      );
    });

    it('deletes a policy that has payments', async () => {
      const { policyId } = await seedPolicy(ctx.warehouse);
      await ctx.warehouse.payments.create(policyId, 'DEBIT');

      expect(await ctx.warehouse.policies.delete(policyId)).toBe(true);
      expect(await ctx.warehouse.policies.getById(policyId)).toBeUndefined();
      expect(await ctx.warehouse.payments.listByPolicy(policyId)).toHaveLength(1);
    });

    it('allows one policy per quote', async () => {
      const { userId, quoteId } = await seedPolicy(ctx.warehouse);

      await expect(ctx.warehouse.policies.create(userId, quoteId)).rejects.toThrow(
        'Quote already has a policy'
      );
      expect(await ctx.warehouse.policies.listByUser(userId)).toHaveLength(1);
    });
  });

  describe('PaymentService', () => {
    it('stores the display label and the authorizer outcome', async () => {
      const { policyId } = await seedPolicy(ctx.warehouse);

      const payment = await ctx.warehouse.payments.create(policyId, 'PREPAID');

      expect(payment).toEqual({
        id: 1,
        time: T0,
        payment_type: 'Prepaid',
        policy_id: policyId,
        success: true,
      });
      expect(ctx.authorizer.calls).toEqual(['PREPAID']);
      expect(await ctx.warehouse.payments.getById(1)).toEqual(payment);
    });

    it.each(['credit', 'Credit', 'CASH', ''])(
      'rejects payment type %j and persists nothing',
      async (paymentType) => {
        const { policyId } = await seedPolicy(ctx.warehouse);

        await expect(ctx.warehouse.payments.create(policyId, paymentType)).rejects.toThrow(
          ValidationError
        );
        expect(await ctx.warehouse.payments.listAll()).toEqual([]);
        expect(ctx.authorizer.calls).toEqual([]);
      }
    );

    it('rejects a missing policy', async () => {
      await expect(ctx.warehouse.payments.create(3, 'CREDIT')).rejects.toThrow(NotFoundError);
    });

    it('filters by outcome, type and policy', async () => {
      const failing = await createTestWarehouse({ outcomes: [true, false, true] });
      try {
        const { policyId } = await seedPolicy(failing.warehouse);
        await failing.warehouse.payments.create(policyId, 'CREDIT');
        await failing.warehouse.payments.create(policyId, 'DEBIT');
        await failing.warehouse.payments.create(policyId, 'CREDIT');

        const { payments } = failing.warehouse;
        expect((await payments.listSuccessful()).map((p) => p.id)).toEqual([1, 3]);
        expect((await payments.listFailed()).map((p) => p.id)).toEqual([2]);
        expect((await payments.listByType('CREDIT')).map((p) => p.id)).toEqual([1, 3]);
        expect(await payments.listByPolicy(policyId)).toHaveLength(3);
        expect(await payments.listByPolicy(policyId + 1)).toEqual([]);
      } finally {
        await closeDb(failing.db);
      }
    });
  });
});
