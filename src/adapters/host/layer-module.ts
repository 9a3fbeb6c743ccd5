/**
 * DocumentRoot Layers module
 *
 * レイヤー解決をホストのリクエストパイプラインに組み込む。
 * 起動時に registerDocumentRootLayers を1回だけ呼ぶ。
 */

import { resolveLayers, type ResolveLayersDeps } from '../../core/layers/resolver.ts';
import type { RequestPipeline } from './pipeline.ts';
import { pushMapToStorageHandler, type RequestRecord } from './request.ts';

/**
 * map-to-storage で実行する差し替え処理
 *
 * Override なら filename と finfo を直接設定する（ホスト側のstatは行われない）。
 * いずれの場合もDECLINEDを返し、後続の処理を続けさせる。
 */
const createDeferredOverride =
  (deps: ResolveLayersDeps) =>
  async (request: RequestRecord): Promise<'DECLINED'> => {
    const outcome = await resolveLayers(request.perDirConfig, request.documentRoot, request.uri, deps);

    if (outcome.type === 'Override') {
      request.filename = outcome.path;
      request.finfo = outcome.metadata;
    }
    return 'DECLINED';
  };

export function registerDocumentRootLayers(pipeline: RequestPipeline, deps: ResolveLayersDeps): void {
  pipeline.registerTranslateName(async (request) => {
    if (!request.perDirConfig.enabled) {
      return 'DECLINED';
    }

    // ファイル名の決定は map-to-storage まで遅らせる
    pushMapToStorageHandler(request, createDeferredOverride(deps));
    return 'DECLINED';
  });
}
