/**
 * Request Pipeline
 *
 * ホストサーバーのリクエスト処理のうち、ファイル決定までの2フェーズをモデル化する。
 *
 * 1. translate-name: 登録順にフックを実行し、OKを返したフックで打ち切る。
 *    全フックがDECLINEDなら filename = DocumentRoot + URI とする
 * 2. map-to-storage: リクエスト固有のハンドラ → 登録済みフックの順に実行し、OKで打ち切る。
 *    最後に finfo が未設定の場合だけ filename をstatする
 *
 * ファイル本体の読み込みや配信は行わない。
 */

import type { FileProber } from '../../core/layers/file-prober.ts';
import { canonicalizePath } from '../../core/layers/path-joiner.ts';
import type { FileMetadata } from '../../types/resolution.ts';
import type { HookStatus, RequestHook, RequestRecord } from './request.ts';

export interface MappedRequest {
  readonly filename: string;
  /** null の場合はホスト側の「見つからない」処理になる */
  readonly finfo: FileMetadata | null;
}

export interface RequestPipelineDeps {
  readonly prober: FileProber;
}

async function runUntilOk(hooks: readonly RequestHook[], request: RequestRecord): Promise<HookStatus> {
  for (const hook of hooks) {
    const status = await hook(request);
    if (status === 'OK') {
      return status;
    }
  }
  return 'DECLINED';
}

export class RequestPipeline {
  private readonly translateNameHooks: RequestHook[] = [];
  private readonly mapToStorageHooks: RequestHook[] = [];
  private readonly prober: FileProber;

  constructor(deps: RequestPipelineDeps) {
    this.prober = deps.prober;
  }

  registerTranslateName(hook: RequestHook): void {
    this.translateNameHooks.push(hook);
  }

  registerMapToStorage(hook: RequestHook): void {
    this.mapToStorageHooks.push(hook);
  }

  /**
   * リクエストのファイル名とメタデータを確定する
   */
  async process(request: RequestRecord): Promise<MappedRequest> {
    const translated = await runUntilOk(this.translateNameHooks, request);
    if (translated === 'DECLINED' || request.filename === null) {
      request.filename = canonicalizePath(`${request.documentRoot}/${request.uri}`);
    }

    await runUntilOk([...request.deferredMapToStorage, ...this.mapToStorageHooks], request);

    const filename = request.filename ?? canonicalizePath(`${request.documentRoot}/${request.uri}`);

    if (request.finfo === null) {
      const probed = await this.prober.probe(filename);
      request.finfo = probed.ok ? probed.val : null;
    }

    return { filename, finfo: request.finfo };
  }
}
