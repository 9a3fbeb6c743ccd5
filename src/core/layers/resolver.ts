/**
 * Layer Resolver
 *
 * 実効設定のレイヤーを宣言順に探索し、最初に見つかった候補で
 * リクエストのファイルを差し替えるかどうかを決める。
 *
 * - enabled=false なら一切statせず NoOverride
 * - 先に宣言されたレイヤーが後のレイヤーおよび DocumentRoot より優先される
 * - statの失敗はそのレイヤーのスキップとして扱い、解決を中断しない
 */

import type { EffectiveConfig } from '../../types/scope-config.ts';
import { NO_OVERRIDE, override, type ResolutionOutcome } from '../../types/resolution.ts';
import type { FileProber } from './file-prober.ts';
import { joinCandidatePath } from './path-joiner.ts';

/**
 * 1回分の探索結果（--explain 表示用）
 */
export interface ProbeStep {
  readonly layer: string;
  readonly candidate: string;
  readonly hit: boolean;
  /** ミス時のerrnoコード */
  readonly code?: string;
}

export interface ResolveLayersDeps {
  readonly prober: FileProber;
  readonly onProbe?: (step: ProbeStep) => void;
}

export async function resolveLayers(
  cfg: EffectiveConfig,
  documentRoot: string,
  requestPath: string,
  deps: ResolveLayersDeps,
): Promise<ResolutionOutcome> {
  if (!cfg.enabled) {
    return NO_OVERRIDE;
  }

  for (const layer of cfg.layers) {
    const candidate = joinCandidatePath(layer, documentRoot, requestPath);
    const probed = await deps.prober.probe(candidate);

    if (probed.ok) {
      deps.onProbe?.({ layer, candidate, hit: true });
      return override(candidate, probed.val);
    }

    deps.onProbe?.({ layer, candidate, hit: false, code: probed.err.code });
  }

  return NO_OVERRIDE;
}
