/**
 * Request Record
 *
 * ホストサーバーが1リクエストの間だけ保持する状態。
 * filename / finfo はマッピング処理の中で確定する。
 */

import { effectiveConfigFor, selectServer } from '../../core/config/scope-lookup.ts';
import type { FileMetadata } from '../../types/resolution.ts';
import type { EffectiveConfig } from '../../types/scope-config.ts';
import type { ServerConfig, ServerScope } from '../../types/server-config.ts';

export type HookStatus = 'OK' | 'DECLINED';

export type RequestHook = (request: RequestRecord) => Promise<HookStatus>;

export interface RequestRecord {
  readonly uri: string;
  readonly hostname: string | undefined;
  readonly server: ServerScope;
  readonly documentRoot: string;
  /** リクエストのスコープに適用される実効設定 */
  readonly perDirConfig: EffectiveConfig;
  filename: string | null;
  finfo: FileMetadata | null;
  /** このリクエストに限って map-to-storage で実行するハンドラ */
  readonly deferredMapToStorage: RequestHook[];
}

export interface IncomingRequest {
  readonly hostname?: string;
  readonly uri: string;
}

export function createRequest(config: ServerConfig, incoming: IncomingRequest): RequestRecord {
  const server = selectServer(config, incoming.hostname);

  return {
    uri: incoming.uri,
    hostname: incoming.hostname,
    server,
    documentRoot: server.documentRoot,
    perDirConfig: effectiveConfigFor(config, server, incoming.uri),
    filename: null,
    finfo: null,
    deferredMapToStorage: [],
  };
}

/**
 * map-to-storage フェーズで実行するハンドラをリクエストに登録する
 */
export function pushMapToStorageHandler(request: RequestRecord, handler: RequestHook): void {
  request.deferredMapToStorage.push(handler);
}
