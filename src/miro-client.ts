/**
 * Thin client for the Miro REST API (v2 boards, v1 OAuth token endpoint).
 *
 * Every call except the token exchange carries the bearer header from the
 * session's CredentialStore.  Non-2xx responses become RemoteAPIError; the
 * axios instance accepts every status so that the decision is made here.
 */

import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type Method,
} from 'axios';
import { type MiroConfig } from './config';
import { type CredentialStore } from './credentials';
import { invalidParamsError, remoteApiError } from './errors';
import { debug } from './logger';

// ── Payload types ──────────────────────────────────────────────────────────

export interface Position {
  x: number;
  y: number;
}

export interface Geometry {
  width: number;
  height: number;
}

export interface ShapeStyleInput {
  fillColor?: string;
  borderColor?: string;
  borderWidth?: number;
}

export interface CreateShapeInput extends ShapeStyleInput {
  shapeType: string;
  x: number;
  y: number;
  width: number;
  height: number;
  content?: string;
}

export interface UpdateShapeInput extends ShapeStyleInput {
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  content?: string;
}

/** Style object in the shape Miro expects (all values are strings). */
export interface ShapeStyle {
  fillColor?: string;
  fillOpacity?: string;
  borderColor?: string;
  borderOpacity?: string;
  borderWidth?: string;
}

/** A board item: the id is guaranteed, every other field is relayed untouched. */
export interface MiroItem {
  [key: string]: unknown;
  id: string;
}

export type JsonObject = Record<string, unknown>;

export interface UngroupResult {
  groupId: string;
  detachedIds: string[];
}

/** Page size used when listing frame children. */
const PAGE_LIMIT = 50;

export interface MiroClientOptions {
  /** Replaces axios' network adapter (used to stand in for the API). */
  adapter?: AxiosAdapter;
}

// ── Response narrowing ─────────────────────────────────────────────────────

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toObject(value: unknown, what: string): JsonObject {
  if (!isObject(value)) {
    throw remoteApiError(null, `unexpected response for ${what}`);
  }
  return value;
}

function toItem(value: unknown, what: string): MiroItem {
  const obj = toObject(value, what);
  const { id } = obj;
  if (typeof id !== 'string' && typeof id !== 'number') {
    throw remoteApiError(null, `response for ${what} has no id`);
  }
  return { ...obj, id: String(id) };
}

function upstreamMessage(data: unknown, statusText: string, status: number): string {
  if (isObject(data) && typeof data.message === 'string' && data.message) {
    return data.message;
  }
  if (typeof data === 'string' && data.trim()) {
    return data.trim();
  }
  return statusText || `HTTP ${status}`;
}

// ── Payload shaping ────────────────────────────────────────────────────────

/** Convert tool style arguments into Miro's style object. */
export function formatStyle(input: ShapeStyleInput): ShapeStyle | undefined {
  const style: ShapeStyle = {};
  if (input.fillColor) {
    style.fillColor = input.fillColor;
    style.fillOpacity = '1.0';
  }
  if (input.borderColor) {
    style.borderColor = input.borderColor;
    style.borderOpacity = '1.0';
  }
  // 0 is a valid border width
  if (input.borderWidth !== undefined) {
    style.borderWidth = String(input.borderWidth);
  }
  return Object.keys(style).length > 0 ? style : undefined;
}

export function buildCreateShapePayload(input: CreateShapeInput): JsonObject {
  const data: JsonObject = { shape: input.shapeType };
  if (input.content) data.content = input.content;

  const payload: JsonObject = {
    data,
    position: { x: input.x, y: input.y },
    geometry: { width: input.width, height: input.height },
  };
  const style = formatStyle(input);
  if (style) payload.style = style;
  return payload;
}

/** Only the fields the caller supplied end up in the PATCH body. */
export function buildUpdateShapePayload(input: UpdateShapeInput): JsonObject {
  const payload: JsonObject = {};

  const position: Partial<Position> = {};
  if (input.x !== undefined) position.x = input.x;
  if (input.y !== undefined) position.y = input.y;
  if (Object.keys(position).length > 0) payload.position = position;

  const geometry: Partial<Geometry> = {};
  if (input.width !== undefined) geometry.width = input.width;
  if (input.height !== undefined) geometry.height = input.height;
  if (Object.keys(geometry).length > 0) payload.geometry = geometry;

  if (input.content !== undefined) payload.data = { content: input.content };

  const style = formatStyle(input);
  if (style) payload.style = style;
  return payload;
}

/**
 * Bounding box of a set of items whose positions are centre points.
 * Returns the centre and size of the box.
 */
export function boundingBox(items: MiroItem[]): Position & Geometry {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const item of items) {
    const position = isObject(item.position) ? item.position : {};
    const geometry = isObject(item.geometry) ? item.geometry : {};
    const { x, y } = position;
    if (typeof x !== 'number' || typeof y !== 'number') {
      throw invalidParamsError(`Item ${item.id} has no position and cannot be grouped`);
    }
    const halfW = (typeof geometry.width === 'number' ? geometry.width : 0) / 2;
    const halfH = (typeof geometry.height === 'number' ? geometry.height : 0) / 2;
    minX = Math.min(minX, x - halfW);
    minY = Math.min(minY, y - halfH);
    maxX = Math.max(maxX, x + halfW);
    maxY = Math.max(maxY, y + halfH);
  }

  return {
    x: (minX + maxX) / 2,
    y: (minY + maxY) / 2,
    width: maxX - minX,
    height: maxY - minY,
  };
}

// ── Client ─────────────────────────────────────────────────────────────────

interface RequestOptions {
  data?: unknown;
  params?: Record<string, string | number>;
  /** Attach the bearer header (default true). */
  auth?: boolean;
}

const boardPath = (boardId: string) => `/v2/boards/${encodeURIComponent(boardId)}`;

export class MiroClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: Pick<MiroConfig, 'apiBaseUrl'>,
    private readonly credentials: CredentialStore,
    options: MiroClientOptions = {}
  ) {
    this.http = axios.create({
      baseURL: config.apiBaseUrl,
      headers: { Accept: 'application/json' },
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  private async request(method: Method, path: string, options: RequestOptions = {}) {
    const headers: Record<string, string> = {};
    if (options.auth !== false) {
      headers.Authorization = this.credentials.getAuthHeader();
    }

    debug(`${method.toUpperCase()} ${this.config.apiBaseUrl}${path}`);
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        method,
        url: path,
        headers,
        ...(options.data !== undefined ? { data: options.data } : {}),
        ...(options.params ? { params: options.params } : {}),
      });
    } catch (error: unknown) {
      throw remoteApiError(null, error instanceof Error ? error.message : String(error));
    }

    const { status, statusText, data } = response;
    if (status < 200 || status >= 300) {
      throw remoteApiError(status, upstreamMessage(data, statusText, status));
    }
    return data;
  }

  // ── OAuth ────────────────────────────────────────────────────────────────

  /** Trade an authorization code for an access token and keep it. */
  async exchangeCodeForToken(code: string): Promise<void> {
    const data = await this.request('post', '/v1/oauth/token', {
      auth: false,
      params: {
        grant_type: 'authorization_code',
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        code,
        redirect_uri: this.credentials.redirectUrl,
      },
    });
    const body = toObject(data, 'token exchange');
    if (typeof body.access_token !== 'string' || !body.access_token) {
      throw remoteApiError(null, 'token response did not contain access_token');
    }
    this.credentials.setToken(body.access_token);
  }

  // ── Boards ───────────────────────────────────────────────────────────────

  async getBoard(boardId: string): Promise<JsonObject> {
    return toObject(await this.request('get', boardPath(boardId)), 'board');
  }

  // ── Shapes ───────────────────────────────────────────────────────────────

  async createShape(boardId: string, input: CreateShapeInput): Promise<MiroItem> {
    const data = await this.request('post', `${boardPath(boardId)}/shapes`, {
      data: buildCreateShapePayload(input),
    });
    return toItem(data, 'created shape');
  }

  async updateShape(boardId: string, itemId: string, input: UpdateShapeInput): Promise<MiroItem> {
    const data = await this.request(
      'patch',
      `${boardPath(boardId)}/shapes/${encodeURIComponent(itemId)}`,
      { data: buildUpdateShapePayload(input) }
    );
    return toItem(data, 'updated shape');
  }

  async deleteShape(boardId: string, itemId: string): Promise<void> {
    await this.request('delete', `${boardPath(boardId)}/shapes/${encodeURIComponent(itemId)}`);
  }

  // ── Items and frames ─────────────────────────────────────────────────────

  async getItem(boardId: string, itemId: string): Promise<MiroItem> {
    const data = await this.request(
      'get',
      `${boardPath(boardId)}/items/${encodeURIComponent(itemId)}`
    );
    return toItem(data, `item ${itemId}`);
  }

  /** All items whose parent is `parentId`, following the page cursor. */
  async listChildItems(boardId: string, parentId: string): Promise<MiroItem[]> {
    const items: MiroItem[] = [];
    let cursor: string | undefined;
    let previous: string | undefined;
    do {
      const page = toObject(
        await this.request('get', `${boardPath(boardId)}/items`, {
          params: {
            parent_item_id: parentId,
            limit: PAGE_LIMIT,
            ...(cursor ? { cursor } : {}),
          },
        }),
        'item list'
      );
      const data = Array.isArray(page.data) ? page.data : [];
      for (const entry of data) {
        items.push(toItem(entry, 'item list entry'));
      }
      previous = cursor;
      cursor = typeof page.cursor === 'string' && page.cursor ? page.cursor : undefined;
    } while (cursor && cursor !== previous);
    return items;
  }

  async createFrame(
    boardId: string,
    frame: { title: string } & Position & Geometry
  ): Promise<MiroItem> {
    const data = await this.request('post', `${boardPath(boardId)}/frames`, {
      data: {
        data: { title: frame.title, format: 'custom' },
        position: { x: frame.x, y: frame.y },
        geometry: { width: frame.width, height: frame.height },
      },
    });
    return toItem(data, 'created frame');
  }

  async getFrame(boardId: string, frameId: string): Promise<MiroItem> {
    const data = await this.request(
      'get',
      `${boardPath(boardId)}/frames/${encodeURIComponent(frameId)}`
    );
    return toItem(data, `frame ${frameId}`);
  }

  async deleteFrame(boardId: string, frameId: string): Promise<void> {
    await this.request('delete', `${boardPath(boardId)}/frames/${encodeURIComponent(frameId)}`);
  }

  /** Move an item into a parent frame, or out of its frame with `null`. */
  async setItemParent(boardId: string, itemId: string, parentId: string | null): Promise<void> {
    await this.request('patch', `${boardPath(boardId)}/items/${encodeURIComponent(itemId)}`, {
      data: { parent: parentId === null ? null : { id: parentId } },
    });
  }

  // ── Grouping ─────────────────────────────────────────────────────────────

  /**
   * Group items by wrapping them in a new frame sized to their bounding
   * box, then re-parenting each item into it.  Returns the frame.
   */
  async groupItems(boardId: string, itemIds: string[]): Promise<MiroItem> {
    const items: MiroItem[] = [];
    for (const itemId of itemIds) {
      items.push(await this.getItem(boardId, itemId));
    }

    const frame = await this.createFrame(boardId, { title: 'Group', ...boundingBox(items) });
    for (const itemId of itemIds) {
      await this.setItemParent(boardId, itemId, frame.id);
    }
    return frame;
  }

  /** Detach every child of a frame, then delete the frame. */
  async ungroupItems(boardId: string, groupId: string): Promise<UngroupResult> {
    const frame = await this.getFrame(boardId, groupId);
    if (frame.type !== undefined && frame.type !== 'frame') {
      throw invalidParamsError(`Item ${groupId} is not a frame/group`);
    }

    const children = await this.listChildItems(boardId, groupId);
    for (const child of children) {
      await this.setItemParent(boardId, child.id, null);
    }
    await this.deleteFrame(boardId, groupId);

    return { groupId, detachedIds: children.map((c) => c.id) };
  }
}
