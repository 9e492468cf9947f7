import { describe, it, expect, beforeEach } from 'vitest';
import { dispatchToolCall } from '../src/dispatch';
import { ToolRegistry, createRegistry } from '../src/registry';
import { MODULES } from '../src/modules';
import { defineTool } from '../src/handlers/define-tool';
import { errorKind } from '../src/errors';
import { type ToolContext } from '../src/types';
import { FakeMiro, createTestContext, parseResult, rejectionOf } from './helpers';

const registry = createRegistry(MODULES);

describe('tool-handlers', () => {
  let fake: FakeMiro;
  let context: ToolContext;

  const call = (name: string, args: unknown) => dispatchToolCall(registry, name, args, context);

  beforeEach(() => {
    fake = new FakeMiro();
    context = createTestContext(fake);
  });

  // ── dispatch ────────────────────────────────────────────────────────────

  describe('dispatch', () => {
    it('rejects an unknown tool without side effects', async () => {
      const error = await rejectionOf(call('draw_unicorn', {}));
      expect(errorKind(error)).toBe('UnknownTool');
      expect(fake.requests).toHaveLength(0);
    });

    it('wraps unexpected handler errors as InternalError', async () => {
      const local = new ToolRegistry();
      local.register(
        defineTool({
          name: 'explode',
          description: 'Always fails',
          params: {},
          handler: async () => {
            throw new Error('boom');
          },
        })
      );

      const error = await rejectionOf(dispatchToolCall(local, 'explode', {}, context));
      expect(error).toMatchObject({
        code: -32603,
        message: 'MCP error -32603: Error executing explode: boom',
      });
      expect(errorKind(error)).toBeUndefined();
    });
  });

  // ── auth ────────────────────────────────────────────────────────────────

  describe('get_auth_url', () => {
    it('returns the authorize URL without needing a token', async () => {
      const anonymous = createTestContext(fake, { authenticated: false });
      const res = parseResult(await dispatchToolCall(registry, 'get_auth_url', {}, anonymous));

      expect(res).toEqual({
        success: true,
        auth_url:
          'https://miro.test/oauth/authorize?response_type=code&client_id=test-client' +
          '&redirect_uri=http%3A%2F%2Flocalhost%3A8080%2Fcallback',
        message:
          'Visit this URL to authorize the application, then use exchange_auth_code ' +
          'with the code from the callback',
      });
      expect(fake.requests).toHaveLength(0);
    });
  });

  describe('exchange_auth_code', () => {
    it('authenticates the session for later calls', async () => {
      context = createTestContext(fake, { authenticated: false });
      fake
        .on('POST', '/v1/oauth/token', { body: { access_token: 'fresh-token' } })
        .on('GET', '/v2/boards/abc', { body: { id: 'abc', name: 'Test' } });

      expect(parseResult(await call('exchange_auth_code', { code: 'auth-code' }))).toEqual({
        success: true,
        message: 'Successfully authenticated with Miro',
      });

      await call('get_board', { board_id: 'abc' });
      expect(fake.requests[1].authorization).toBe('Bearer fresh-token');
    });

    it('requires a code', async () => {
      const error = await rejectionOf(call('exchange_auth_code', {}));
      expect(error).toMatchObject({
        message: 'MCP error -32602: Missing required argument(s): code',
      });
    });

    it('leaves the session unauthenticated when the exchange is refused', async () => {
      context = createTestContext(fake, { authenticated: false });
      fake.on('POST', '/v1/oauth/token', {
        status: 400,
        body: { message: 'Invalid authorization code' },
      });

      const error = await rejectionOf(call('exchange_auth_code', { code: 'stale' }));
      expect(error).toMatchObject({
        message: 'MCP error -32603: Miro API error 400: Invalid authorization code',
      });
      expect(context.credentials.isAuthenticated()).toBe(false);
    });
  });

  describe('before authentication', () => {
    it.each([
      ['get_board', { board_id: 'b1' }],
      ['create_shape', { board_id: 'b1', shape_type: 'star', x: 0, y: 0, width: 10, height: 10 }],
      ['update_shape', { board_id: 'b1', item_id: 's1', content: 'x' }],
      ['delete_shape', { board_id: 'b1', item_id: 's1' }],
      ['group_shapes', { board_id: 'b1', item_ids: ['s1', 's2'] }],
      ['ungroup_shapes', { board_id: 'b1', group_id: 'f1' }],
    ])('%s fails with NotAuthenticated', async (name, args) => {
      context = createTestContext(fake, { authenticated: false });

      const error = await rejectionOf(call(name, args));
      expect(errorKind(error)).toBe('NotAuthenticated');
      expect(error).toMatchObject({ code: -32600 });
      expect(fake.requests).toHaveLength(0);
    });
  });

  // ── board ───────────────────────────────────────────────────────────────

  describe('get_board', () => {
    it('relays the board object', async () => {
      fake.on('GET', '/v2/boards/abc', { body: { id: 'abc', name: 'Test' } });

      const res = parseResult(await call('get_board', { board_id: 'abc' }));
      expect(res).toEqual({ success: true, board: { id: 'abc', name: 'Test' } });
    });

    it('surfaces upstream failures as RemoteAPIError', async () => {
      fake.on('GET', '/v2/boards/abc', { status: 403, body: { message: 'Forbidden' } });

      const error = await rejectionOf(call('get_board', { board_id: 'abc' }));
      expect(errorKind(error)).toBe('RemoteAPIError');
      expect(error).toMatchObject({ data: { status: 403 } });
    });
  });

  // ── shapes ──────────────────────────────────────────────────────────────

  describe('create_shape', () => {
    beforeEach(() => {
      fake.on('POST', '/v2/boards/b1/shapes', { status: 201, body: { id: 's1', type: 'shape' } });
    });

    it('sends only the required fields when optionals are omitted', async () => {
      const res = parseResult(
        await call('create_shape', {
          board_id: 'b1',
          shape_type: 'rectangle',
          x: 0,
          y: '20',
          width: 100,
          height: 50,
        })
      );

      expect(res).toEqual({ success: true, shape: { id: 's1', type: 'shape' } });
      expect(fake.requests[0].body).toEqual({
        data: { shape: 'rectangle' },
        position: { x: 0, y: 20 },
        geometry: { width: 100, height: 50 },
      });
    });

    it('includes style and content when given', async () => {
      await call('create_shape', {
        board_id: 'b1',
        shape_type: 'circle',
        x: 1,
        y: 2,
        width: 30,
        height: 30,
        fillColor: '#FF0000',
        borderWidth: 0,
        content: 'Hello',
      });

      expect(fake.requests[0].body).toEqual({
        data: { shape: 'circle', content: 'Hello' },
        position: { x: 1, y: 2 },
        geometry: { width: 30, height: 30 },
        style: { fillColor: '#FF0000', fillOpacity: '1.0', borderWidth: '0' },
      });
    });

    it('leaves out empty content', async () => {
      await call('create_shape', {
        board_id: 'b1',
        shape_type: 'circle',
        x: 1,
        y: 2,
        width: 30,
        height: 30,
        content: '',
      });

      expect(fake.requests[0].body).toEqual({
        data: { shape: 'circle' },
        position: { x: 1, y: 2 },
        geometry: { width: 30, height: 30 },
      });
    });

    it('rejects an unsupported shape type before calling Miro', async () => {
      const error = await rejectionOf(
        call('create_shape', {
          board_id: 'b1',
          shape_type: 'blob',
          x: 0,
          y: 0,
          width: 10,
          height: 10,
        })
      );
      expect(errorKind(error)).toBe('InvalidParams');
      expect(fake.requests).toHaveLength(0);
    });

    it('reports missing geometry', async () => {
      const error = await rejectionOf(
        call('create_shape', { board_id: 'b1', shape_type: 'star', x: 0, y: 0 })
      );
      expect(error).toMatchObject({
        message: 'MCP error -32602: Missing required argument(s): width, height',
      });
    });
  });

  describe('update_shape', () => {
    beforeEach(() => {
      fake.on('PATCH', '/v2/boards/b1/shapes/s1', { body: { id: 's1', type: 'shape' } });
    });

    it('sends only content when only content is given', async () => {
      const res = parseResult(
        await call('update_shape', { board_id: 'b1', item_id: 's1', content: 'Hello' })
      );

      expect(res).toEqual({ success: true, shape: { id: 's1', type: 'shape' } });
      expect(fake.requests).toHaveLength(1);
      expect(fake.requests[0]).toMatchObject({
        method: 'PATCH',
        url: '/v2/boards/b1/shapes/s1',
        body: { data: { content: 'Hello' } },
      });
      expect(fake.requests[0].body).toEqual({ data: { content: 'Hello' } });
    });

    it('sends a partial position and style', async () => {
      await call('update_shape', {
        board_id: 'b1',
        item_id: 's1',
        y: 15,
        borderColor: '#000000',
      });

      expect(fake.requests[0].body).toEqual({
        position: { y: 15 },
        style: { borderColor: '#000000', borderOpacity: '1.0' },
      });
    });

    it('rejects an update with nothing to change', async () => {
      const error = await rejectionOf(call('update_shape', { board_id: 'b1', item_id: 's1' }));
      expect(error).toMatchObject({
        message:
          'MCP error -32602: Provide at least one of: x, y, width, height, ' +
          'fillColor, borderColor, borderWidth, content',
      });
      expect(fake.requests).toHaveLength(0);
    });

    it('treats blank colors as no change', async () => {
      const error = await rejectionOf(
        call('update_shape', { board_id: 'b1', item_id: 's1', fillColor: '', borderColor: '' })
      );
      expect(error).toMatchObject({ data: { kind: 'InvalidParams' } });
      expect(fake.requests).toHaveLength(0);
    });
  });

  describe('delete_shape', () => {
    it('deletes and confirms', async () => {
      fake.on('DELETE', '/v2/boards/b1/shapes/s1', { status: 204 });

      const res = parseResult(await call('delete_shape', { board_id: 'b1', item_id: 's1' }));
      expect(res).toEqual({ success: true, message: 'Shape s1 deleted successfully' });
      expect(fake.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
        'DELETE /v2/boards/b1/shapes/s1',
      ]);
    });
  });

  // ── groups ──────────────────────────────────────────────────────────────

  describe('group_shapes', () => {
    it('rejects a single item id before calling Miro', async () => {
      const error = await rejectionOf(call('group_shapes', { board_id: 'b1', item_ids: ['s1'] }));
      expect(errorKind(error)).toBe('InvalidParams');
      expect(error).toMatchObject({
        message: "MCP error -32602: Argument 'item_ids' must contain at least 2 items",
      });
      expect(fake.requests).toHaveLength(0);
    });

    it('rejects duplicate item ids', async () => {
      const error = await rejectionOf(
        call('group_shapes', { board_id: 'b1', item_ids: ['s1', 's1'] })
      );
      expect(error).toMatchObject({
        message: 'MCP error -32602: item_ids must not contain duplicates',
      });
    });

    it('returns the created frame', async () => {
      fake
        .on('GET', '/v2/boards/b1/items/s1', {
          body: { id: 's1', position: { x: 0, y: 0 }, geometry: { width: 10, height: 10 } },
        })
        .on('GET', '/v2/boards/b1/items/s2', {
          body: { id: 's2', position: { x: 20, y: 0 }, geometry: { width: 10, height: 10 } },
        })
        .on('POST', '/v2/boards/b1/frames', { status: 201, body: { id: 'f1', type: 'frame' } })
        .on('PATCH', '/v2/boards/b1/items/s1', { body: { id: 's1' } })
        .on('PATCH', '/v2/boards/b1/items/s2', { body: { id: 's2' } });

      const res = parseResult(
        await call('group_shapes', { board_id: 'b1', item_ids: ['s1', 's2'] })
      );
      expect(res).toEqual({
        success: true,
        group: { id: 'f1', type: 'frame' },
        message: 'Successfully grouped 2 shapes',
      });
      expect(fake.requests[2].body).toMatchObject({
        position: { x: 10, y: 0 },
        geometry: { width: 30, height: 10 },
      });
    });
  });

  describe('ungroup_shapes', () => {
    it('reports how many items were detached', async () => {
      fake
        .on('GET', '/v2/boards/b1/frames/f1', { body: { id: 'f1', type: 'frame' } })
        .on('GET', '/v2/boards/b1/items', { body: { data: [{ id: 's1' }, { id: 's2' }] } })
        .on('PATCH', '/v2/boards/b1/items/s1', { body: { id: 's1' } })
        .on('PATCH', '/v2/boards/b1/items/s2', { body: { id: 's2' } })
        .on('DELETE', '/v2/boards/b1/frames/f1', { status: 204 });

      const res = parseResult(await call('ungroup_shapes', { board_id: 'b1', group_id: 'f1' }));
      expect(res).toEqual({
        success: true,
        detachedIds: ['s1', 's2'],
        message: 'Ungrouped 2 items',
      });
    });
  });
});
