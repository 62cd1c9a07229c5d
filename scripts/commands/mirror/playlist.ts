/**
 * mirror/playlist.ts
 *
 * 播放列表的两端处理：
 *   - extractServerBase：找出当前使用的 server base 与全部频道路径
 *   - rewritePlaylist：把旧 server base 整体替换为新的
 *
 * 只改 URL 里的 server base，其余内容（#EXTINF、频道名、换行符）原样保留。
 */

import { MirrorError } from './errors'

/**
 * 频道链接的形状：<scheme>://<hostPrefix><数字>.<domain>[:port]<path><extension>[?query]
 */
export interface LinkPattern {
  schemes: string[]
  hostPrefix: string
  domain: string
  extension: string
  allowPort: boolean
  /** 为 true 时 ?query 算作路径的一部分 */
  keepQuery: boolean
}

export interface ExtractResult {
  /** 第一个匹配到的 server base，视为本次运行的基准 */
  serverBase: string
  /** 去重后的频道路径，按首次出现顺序 */
  paths: string[]
  /** 与 serverBase 不同的其他 base，只做提示 */
  otherBases: string[]
}

export interface RewriteResult {
  text: string
  changed: boolean
  /** 被改写条目的频道名 */
  updated: string[]
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export function buildLinkPattern(domain: string, overrides: Partial<Omit<LinkPattern, 'domain'>> = {}): LinkPattern {
  return {
    schemes: ['http', 'https'],
    hostPrefix: 'fl',
    extension: '.m3u8',
    allowPort: true,
    keepQuery: false,
    ...overrides,
    domain,
  }
}

export function compileLinkPattern(pattern: LinkPattern): RegExp {
  const schemes = pattern.schemes.map(escapeRegExp).join('|')
  const port = pattern.allowPort ? '(?::\\d+)?' : ''
  const base = `((?:${schemes})://${escapeRegExp(pattern.hostPrefix)}\\d+\\.${escapeRegExp(pattern.domain)}${port})`
  const query = pattern.keepQuery ? '(?:\\?[^\\s"\'<>#]*)?' : ''
  const path = `(/[^\\s"'<>?#]*${escapeRegExp(pattern.extension)}(?=[\\s"'<>?#]|$)${query})`
  return new RegExp(base + path, 'i')
}

export function extractServerBase(text: string, pattern: LinkPattern): ExtractResult | null {
  const matcher = compileLinkPattern(pattern)
  const domain = pattern.domain.toLowerCase()

  let serverBase = ''
  const paths = new Set<string>()
  const otherBases = new Set<string>()

  for (const line of text.split(/\r?\n/)) {
    if (!line.toLowerCase().includes(domain)) continue
    const m = line.match(matcher)
    if (!m) continue

    const [, base, path] = m
    if (!serverBase) {
      serverBase = base
    } else if (base !== serverBase) {
      otherBases.add(base)
    }
    paths.add(path)
  }

  if (!serverBase) return null
  return { serverBase, paths: [...paths], otherBases: [...otherBases] }
}

/** 从 #EXTINF 行末尾逗号后取显示名称 */
function displayName(extinf: string): string {
  return extinf.split(',').slice(1).join(',').trim()
}

export function rewritePlaylist(text: string, fromBase: string, toBase: string): RewriteResult {
  if (!fromBase || !toBase) {
    throw new MirrorError('InvalidServerBase', '缺少旧的或新的 server base，放弃改写')
  }

  // 后面紧跟主机字符的不算，避免 fl1 误伤 fl10 或带端口的 base
  const target = new RegExp(`${escapeRegExp(fromBase)}(?![\\w.:-])`, 'gi')

  let changed = false
  let pendingName = ''
  const updated: string[] = []

  // 按行切分但保留行尾，未改动的行逐字节保持原样
  const lines = text.split(/(?<=\n)/).map(line => {
    const trimmed = line.trim()
    if (trimmed.startsWith('#EXTINF')) {
      pendingName = displayName(trimmed)
      return line
    }

    const next = line.replace(target, () => toBase)
    if (next !== line) {
      changed = true
      updated.push(pendingName || trimmed)
    }
    if (trimmed && !trimmed.startsWith('#')) pendingName = ''
    return next
  })

  return { text: lines.join(''), changed, updated }
}
