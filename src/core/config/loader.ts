/**
 * Server Config Loader
 *
 * ディレクティブのツリーを辿り、メインサーバー・バーチャルホスト・Location の
 * 各スコープ設定を構築する。最初のエラーで読み込みを中断する（起動時の致命的エラー）。
 *
 * 扱うホスト側ディレクティブ: ServerRoot / DocumentRoot / ServerName / ServerAlias
 * それ以外の未知のディレクティブは無視する。
 */

import * as path from 'node:path';
import { createOk, createErr, isErr, type Result } from 'option-t/plain_result';
import type { ConfigNode, DirectiveOccurrence, SourceLocation } from '../../types/directive.ts';
import { toOccurrence } from '../../types/directive.ts';
import type { ConfigError } from '../../types/errors.ts';
import { directiveSyntaxError } from '../../types/errors.ts';
import { DEFAULT_EFFECTIVE_CONFIG } from '../../types/scope-config.ts';
import type { LocationMatcher, LocationSection, ServerConfig, ServerScope } from '../../types/server-config.ts';
import {
  applyLayerDirective,
  createScopeConfigBuilder,
  findLayerDirective,
  freezeScopeConfig,
  type ScopeConfigBuilder,
} from './directives.ts';
import { mergeScopeConfig } from './merge.ts';
import { readConfigFile, parseConfigText } from './reader.ts';

/**
 * DocumentRoot が一度も宣言されなかった場合の値（httpdのデフォルトと同じ）
 */
export const DEFAULT_DOCUMENT_ROOT = '/usr/local/apache2/htdocs';

export interface LoadServerConfigOptions {
  /** 無視した設定の通知先（省略時は console.warn） */
  readonly onWarning?: (message: string) => void;
  readonly defaultDocumentRoot?: string;
}

interface LocationBuilder {
  readonly match: LocationMatcher;
  readonly scope: ScopeConfigBuilder;
  readonly location: SourceLocation;
}

interface ServerBuilder {
  serverName: string | null;
  readonly serverAliases: string[];
  documentRoot: string | null;
  readonly scope: ScopeConfigBuilder;
  readonly locations: LocationBuilder[];
  readonly location: SourceLocation | null;
}

interface LoaderState {
  readonly main: ServerBuilder;
  readonly virtualHosts: ServerBuilder[];
  serverRoot: string | null;
  readonly warn: (message: string) => void;
}

/**
 * 走査中のコンテキスト
 *
 * - filesystem: <Directory*> / <Files*> の内側。スコープは作らず、scope は破棄される
 */
interface WalkContext {
  readonly kind: 'server' | 'virtualhost' | 'location' | 'filesystem';
  readonly server: ServerBuilder;
  readonly scope: ScopeConfigBuilder;
}

const FILESYSTEM_SECTIONS = new Set(['<directory', '<directorymatch', '<files', '<filesmatch']);

const createServerBuilder = (location: SourceLocation | null): ServerBuilder => ({
  serverName: null,
  serverAliases: [],
  documentRoot: null,
  scope: createScopeConfigBuilder(),
  locations: [],
  location,
});

const at = (location: SourceLocation): string => `${location.file}:${location.line}`;

/**
 * "host:port" からホスト名部分を取り出す
 */
export const stripPort = (name: string): string => {
  if (name.startsWith('[')) {
    const end = name.indexOf(']');
    return end === -1 ? name : name.slice(0, end + 1);
  }
  const colon = name.lastIndexOf(':');
  return colon === -1 ? name : name.slice(0, colon);
};

function cannotOccurWithin(node: ConfigNode, parent: DirectiveOccurrence | null): ConfigError {
  const enclosing = parent ? `${parent.name}>` : 'this';
  return directiveSyntaxError(node.name, `${node.name}> cannot occur within ${enclosing} section`, node.location);
}

const CASE_INSENSITIVE_PREFIX = '(?i)';

/**
 * Location の正規表現をコンパイルする
 *
 * 先頭の "(?i)" は i フラグとして扱う。
 */
const compileLocationPattern = (source: string): RegExp =>
  source.startsWith(CASE_INSENSITIVE_PREFIX)
    ? new RegExp(source.slice(CASE_INSENSITIVE_PREFIX.length), 'i')
    : new RegExp(source);

function buildLocationMatcher(node: ConfigNode): Result<LocationMatcher, ConfigError> {
  const isMatchSection = node.name.toLowerCase() === '<locationmatch';
  const [first, second] = node.args;

  if (first === undefined) {
    return createErr(
      directiveSyntaxError(node.name, `${node.name}> directive requires additional arguments`, node.location),
    );
  }

  const source = isMatchSection ? first : first === '~' ? second : undefined;
  if (source === undefined) {
    if (first === '~') {
      return createErr(
        directiveSyntaxError(node.name, `${node.name}> directive requires additional arguments`, node.location),
      );
    }
    return createOk({ type: 'prefix', prefix: first });
  }

  try {
    return createOk({ type: 'regex', pattern: compileLocationPattern(source) });
  } catch (error) {
    return createErr(
      directiveSyntaxError(
        node.name,
        `Regular expression could not be compiled: ${error instanceof Error ? error.message : String(error)}`,
        node.location,
      ),
    );
  }
}

function applyHostDirective(
  state: LoaderState,
  context: WalkContext,
  node: ConfigNode,
): Result<void, ConfigError> {
  const name = node.name.toLowerCase();
  const atServerLevel = context.kind === 'server' || context.kind === 'virtualhost';

  switch (name) {
    case 'serverroot':
    case 'documentroot':
    case 'servername': {
      const value = node.args[0];
      if (value === undefined || node.args.length !== 1) {
        return createErr(directiveSyntaxError(node.name, `${node.name} takes one argument`, node.location));
      }
      if (!atServerLevel || (name === 'serverroot' && context.kind !== 'server')) {
        state.warn(`${at(node.location)}: ${node.name} is not allowed here, ignored`);
        return createOk(undefined);
      }

      if (name === 'serverroot') {
        state.serverRoot = value;
      } else if (name === 'documentroot') {
        context.server.documentRoot = value;
      } else {
        context.server.serverName = stripPort(value);
      }
      return createOk(undefined);
    }

    case 'serveralias': {
      if (!atServerLevel) {
        state.warn(`${at(node.location)}: ${node.name} is not allowed here, ignored`);
        return createOk(undefined);
      }
      context.server.serverAliases.push(...node.args);
      return createOk(undefined);
    }

    default:
      return createOk(undefined);
  }
}

function walk(
  state: LoaderState,
  nodes: readonly ConfigNode[],
  context: WalkContext,
  parent: DirectiveOccurrence | null,
): Result<void, ConfigError> {
  for (const node of nodes) {
    const occurrence = toOccurrence(node, parent);
    const name = node.name.toLowerCase();

    const layerDirective = findLayerDirective(node.name);
    if (layerDirective !== undefined) {
      const result = applyLayerDirective(layerDirective, context.scope, occurrence);
      if (isErr(result)) {
        return result;
      }
      continue;
    }

    if (!name.startsWith('<')) {
      const result = applyHostDirective(state, context, node);
      if (isErr(result)) {
        return result;
      }
      continue;
    }

    let childContext: WalkContext;

    if (name === '<virtualhost') {
      if (context.kind !== 'server') {
        return createErr(cannotOccurWithin(node, parent));
      }
      const vhost = createServerBuilder(node.location);
      state.virtualHosts.push(vhost);
      childContext = { kind: 'virtualhost', server: vhost, scope: vhost.scope };
    } else if (name === '<location' || name === '<locationmatch') {
      if (context.kind !== 'server' && context.kind !== 'virtualhost') {
        return createErr(cannotOccurWithin(node, parent));
      }
      const matcherResult = buildLocationMatcher(node);
      if (isErr(matcherResult)) {
        return matcherResult;
      }
      const section: LocationBuilder = {
        match: matcherResult.val,
        scope: createScopeConfigBuilder(),
        location: node.location,
      };
      context.server.locations.push(section);
      childContext = { kind: 'location', server: context.server, scope: section.scope };
    } else if (FILESYSTEM_SECTIONS.has(name)) {
      childContext = { kind: 'filesystem', server: context.server, scope: createScopeConfigBuilder() };
    } else {
      // <IfModule> などはそのまま外側のスコープに属する
      childContext = context;
    }

    const result = walk(state, node.children, childContext, occurrence);
    if (isErr(result)) {
      return result;
    }
  }

  return createOk(undefined);
}

const freezeLocations = (locations: readonly LocationBuilder[]): readonly LocationSection[] =>
  Object.freeze(
    locations.map((section) =>
      Object.freeze({ match: section.match, local: freezeScopeConfig(section.scope), location: section.location }),
    ),
  );

/**
 * ディレクティブのツリーから ServerConfig を構築する
 *
 * @param nodes - parseConfigText の結果
 * @param sourcePath - 設定ファイルのパス（ServerRoot のデフォルト算出に使う）
 */
export function buildServerConfig(
  nodes: readonly ConfigNode[],
  sourcePath: string,
  options: LoadServerConfigOptions = {},
): Result<ServerConfig, ConfigError> {
  const state: LoaderState = {
    main: createServerBuilder(null),
    virtualHosts: [],
    serverRoot: null,
    warn: options.onWarning ?? ((message) => console.warn(message)),
  };

  const walkResult = walk(state, nodes, { kind: 'server', server: state.main, scope: state.main.scope }, null);
  if (isErr(walkResult)) {
    return walkResult;
  }

  const configDir = path.dirname(path.resolve(sourcePath));
  const serverRoot = state.serverRoot === null ? configDir : path.resolve(configDir, state.serverRoot);
  const resolveRoot = (raw: string): string => path.resolve(serverRoot, raw);

  const mainLocal = freezeScopeConfig(state.main.scope);
  const main: ServerScope = Object.freeze({
    serverName: state.main.serverName,
    serverAliases: Object.freeze([...state.main.serverAliases]),
    documentRoot: resolveRoot(state.main.documentRoot ?? options.defaultDocumentRoot ?? DEFAULT_DOCUMENT_ROOT),
    local: mainLocal,
    effective: Object.freeze(mergeScopeConfig(DEFAULT_EFFECTIVE_CONFIG, mainLocal)),
    locations: freezeLocations(state.main.locations),
    location: null,
  });

  const virtualHosts = state.virtualHosts.map((vhost): ServerScope => {
    const local = freezeScopeConfig(vhost.scope);
    return Object.freeze({
      serverName: vhost.serverName,
      serverAliases: Object.freeze([...vhost.serverAliases]),
      documentRoot: vhost.documentRoot === null ? main.documentRoot : resolveRoot(vhost.documentRoot),
      local,
      effective: Object.freeze(mergeScopeConfig(main.effective, local)),
      locations: freezeLocations(vhost.locations),
      location: vhost.location,
    });
  });

  return createOk(Object.freeze({ sourcePath, main, virtualHosts: Object.freeze(virtualHosts) }));
}

/**
 * 設定テキストから ServerConfig を構築する
 */
export function loadServerConfigFromText(
  text: string,
  sourcePath: string,
  options: LoadServerConfigOptions = {},
): Result<ServerConfig, ConfigError> {
  const parsed = parseConfigText(text, sourcePath);
  if (isErr(parsed)) {
    return parsed;
  }
  return buildServerConfig(parsed.val, sourcePath, options);
}

/**
 * 設定ファイルを読み込み ServerConfig を構築する
 */
export async function loadServerConfig(
  filePath: string,
  options: LoadServerConfigOptions = {},
): Promise<Result<ServerConfig, ConfigError>> {
  const parsed = await readConfigFile(filePath);
  if (isErr(parsed)) {
    return parsed;
  }
  return buildServerConfig(parsed.val, filePath, options);
}
