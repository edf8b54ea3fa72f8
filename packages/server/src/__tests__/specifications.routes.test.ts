import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { buildApp } from './helpers.js';

interface Ordered {
  id: number;
  content: string;
  orderIndex: number;
}

describe('specification and item routes', () => {
  let app: express.Express;
  let alice: string;
  let bob: string;
  let projectId: number;

  beforeEach(async () => {
    const ctx = buildApp();
    app = ctx.app;
    alice = await ctx.authHeader('alice');
    bob = await ctx.authHeader('bob');
    const res = await request(app).post('/api/v1/projects').set('Authorization', alice).send({ title: 'Roadmap' });
    projectId = res.body.project.id;
  });

  async function createSpecs(count: number): Promise<number[]> {
    const ids: number[] = [];
    for (let i = 0; i < count; i++) {
      const res = await request(app)
        .post(`/api/v1/projects/${projectId}/specifications`)
        .set('Authorization', alice)
        .send({ content: `spec${i}` });
      ids.push(res.body.specification.id);
    }
    return ids;
  }

  async function createItems(specId: number, count: number): Promise<number[]> {
    const ids: number[] = [];
    for (let i = 0; i < count; i++) {
      const res = await request(app)
        .post(`/api/v1/specifications/${specId}/items`)
        .set('Authorization', alice)
        .send({ content: `item${i}` });
      ids.push(res.body.item.id);
    }
    return ids;
  }

  describe('PUT /api/v1/specifications/:specId/order', () => {
    it('move_LastToSecond_ShiftsOthersDown', async () => {
      const ids = await createSpecs(5);

      const res = await request(app)
        .put(`/api/v1/specifications/${ids[4]}/order`)
        .set('Authorization', alice)
        .send({ orderIndex: 1 });

      expect(res.status).toBe(200);
      expect(res.body.specifications.map((s: Ordered) => [s.content, s.orderIndex])).toEqual([
        ['spec0', 0],
        ['spec4', 1],
        ['spec1', 2],
        ['spec2', 3],
        ['spec3', 4],
      ]);
    });

    it('move_SameIndex_LeavesOrderUnchanged', async () => {
      const ids = await createSpecs(3);

      const res = await request(app)
        .put(`/api/v1/specifications/${ids[1]}/order`)
        .set('Authorization', alice)
        .send({ orderIndex: 1 });

      expect(res.body.specifications.map((s: Ordered) => s.content)).toEqual(['spec0', 'spec1', 'spec2']);
    });

    it('move_OutOfRange_Returns400', async () => {
      const ids = await createSpecs(2);

      const res = await request(app)
        .put(`/api/v1/specifications/${ids[0]}/order`)
        .set('Authorization', alice)
        .send({ orderIndex: 2 });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Position 2 is outside [0, 1]');
    });

    it('move_MissingOrderIndex_Returns400', async () => {
      const ids = await createSpecs(1);

      const res = await request(app).put(`/api/v1/specifications/${ids[0]}/order`).set('Authorization', alice).send({});

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('orderIndex is required');
    });

    it('move_OtherOwner_Returns403', async () => {
      const ids = await createSpecs(2);

      const res = await request(app)
        .put(`/api/v1/specifications/${ids[0]}/order`)
        .set('Authorization', bob)
        .send({ orderIndex: 1 });

      expect(res.status).toBe(403);
    });
  });

  describe('DELETE /api/v1/specifications/:specId', () => {
    it('delete_Middle_ClosesGap', async () => {
      const ids = await createSpecs(3);

      const del = await request(app).delete(`/api/v1/specifications/${ids[1]}`).set('Authorization', alice);
      const res = await request(app).get(`/api/v1/projects/${projectId}/specifications`).set('Authorization', alice);

      expect(del.status).toBe(204);
      expect(res.body.specifications.map((s: Ordered) => [s.content, s.orderIndex])).toEqual([
        ['spec0', 0],
        ['spec2', 1],
      ]);
    });
  });

  describe('items', () => {
    it('create_TenItems_EleventhReturns409', async () => {
      const [specId] = await createSpecs(1);
      await createItems(specId, 10);

      const res = await request(app)
        .post(`/api/v1/specifications/${specId}/items`)
        .set('Authorization', alice)
        .send({ content: 'one too many' });

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('CAPACITY_EXCEEDED');
      expect(res.body.error.message).toBe('Maximum number of items (10) reached for specification');
      expect(res.body.error.details).toEqual({ kind: 'item', maxAllowed: 10 });
    });

    it('create_ContentTooLong_Returns400', async () => {
      const [specId] = await createSpecs(1);

      const res = await request(app)
        .post(`/api/v1/specifications/${specId}/items`)
        .set('Authorization', alice)
        .send({ content: 'x'.repeat(1001) });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('content must be at most 1000 characters');
    });

    it('list_AfterCreates_OrderedByIndex', async () => {
      const [specId] = await createSpecs(1);
      await createItems(specId, 2);
      await request(app)
        .post(`/api/v1/specifications/${specId}/items`)
        .set('Authorization', alice)
        .send({ content: 'first', position: 0 });

      const res = await request(app).get(`/api/v1/specifications/${specId}/items`).set('Authorization', alice);

      expect(res.status).toBe(200);
      expect(res.body.items.map((i: Ordered) => [i.content, i.orderIndex])).toEqual([
        ['first', 0],
        ['item0', 1],
        ['item1', 2],
      ]);
    });

    it('reorder_Reverse_AppliesPermutation', async () => {
      const [specId] = await createSpecs(1);
      const ids = await createItems(specId, 3);

      const res = await request(app)
        .put(`/api/v1/specifications/${specId}/items/order`)
        .set('Authorization', alice)
        .send({ moves: ids.map((id, i) => ({ id, orderIndex: 2 - i })) });

      expect(res.status).toBe(200);
      expect(res.body.items.map((i: Ordered) => i.content)).toEqual(['item2', 'item1', 'item0']);
    });

    it('update_Content_KeepsOrderIndex', async () => {
      const [specId] = await createSpecs(1);
      const ids = await createItems(specId, 2);

      const res = await request(app)
        .put(`/api/v1/items/${ids[1]}`)
        .set('Authorization', alice)
        .send({ content: ' renamed ' });

      expect(res.status).toBe(200);
      expect(res.body.item).toMatchObject({ id: ids[1], content: 'renamed', orderIndex: 1 });
    });

    it('update_OtherOwner_Returns403', async () => {
      const [specId] = await createSpecs(1);
      const [itemId] = await createItems(specId, 1);

      const res = await request(app).put(`/api/v1/items/${itemId}`).set('Authorization', bob).send({ content: 'mine' });

      expect(res.status).toBe(403);
    });

    it('delete_First_ReindexesRemaining', async () => {
      const [specId] = await createSpecs(1);
      const ids = await createItems(specId, 3);

      const del = await request(app).delete(`/api/v1/items/${ids[0]}`).set('Authorization', alice);
      const res = await request(app).get(`/api/v1/specifications/${specId}/items`).set('Authorization', alice);

      expect(del.status).toBe(204);
      expect(res.body.items.map((i: Ordered) => [i.content, i.orderIndex])).toEqual([
        ['item1', 0],
        ['item2', 1],
      ]);
    });

    it('delete_MissingItem_Returns404', async () => {
      const res = await request(app).delete('/api/v1/items/42').set('Authorization', alice);

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Item 42 not found');
    });
  });
});
