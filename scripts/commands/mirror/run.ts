import fs from 'fs'

import type { MirrorConfig } from './config'
import { MirrorError, isMirrorError, type MirrorErrorKind } from './errors'
import { buildLinkPattern, extractServerBase, rewritePlaylist } from './playlist'
import { findWorkingServers, type ProbeFn } from './probe'
import { loadServers } from './servers'

export type UpdateOutcome =
  | { status: 'updated'; from: string; to: string; updated: string[]; written: boolean }
  | { status: 'noop'; reason: 'already-current' | 'nothing-replaced'; serverBase: string }
  | { status: 'aborted'; reason: MirrorErrorKind; message: string; stage: Stage }

export type Stage = 'extract' | 'probe' | 'rewrite'

export interface UpdateDeps {
  probe?: ProbeFn
  sleep?: (ms: number) => Promise<void>
}

function readPlaylist(filepath: string): string {
  if (!fs.existsSync(filepath)) {
    throw new MirrorError('FileNotFound', `播放列表文件不存在: ${filepath}`)
  }
  return fs.readFileSync(filepath, 'utf-8')
}

async function runStages(config: MirrorConfig, deps: UpdateDeps, progress: { stage: Stage }): Promise<UpdateOutcome> {
  // ── 提取 ──
  progress.stage = 'extract'
  const raw = readPlaylist(config.playlistFile)
  const extracted = extractServerBase(raw, buildLinkPattern(config.targetDomain))
  if (!extracted) {
    throw new MirrorError('NoMatchFound', `播放列表中找不到 ${config.targetDomain} 的频道链接，无法确定测试路径`)
  }
  const { serverBase, paths, otherBases } = extracted
  console.log(`[提取] 当前 server base：${serverBase}`)
  console.log(`[提取] 频道路径 ${paths.length} 个，测试频道：${paths[0]}`)
  if (otherBases.length > 0) {
    console.warn(`[提取] ⚠ 播放列表中还有其他 server base，本次只替换 ${serverBase}：`)
    otherBases.forEach(b => console.warn(`  - ${b}`))
  }

  // ── 探测 ──
  progress.stage = 'probe'
  const servers = loadServers(config.serverListFile)
  if (servers.length === 0) {
    throw new MirrorError('NoServersLoaded', '服务器列表为空，放弃本次运行')
  }
  const working = await findWorkingServers(servers, paths, {
    policy: config.policy,
    maxWorking: config.maxWorking,
    timing: config.timing,
    probe: deps.probe,
    sleep: deps.sleep,
  })
  if (working.length === 0) {
    throw new MirrorError('NoWorkingServerFound', `检查完全部 ${servers.length} 个候选，没有可用的服务器，播放列表未更新`)
  }
  console.log(`[探测] 可用服务器 ${working.length} 个：${working.join(', ')}`)

  // ── 比较 ──
  const next = working[0]
  if (next === serverBase) {
    console.log(`\n当前已在使用可用服务器 ${serverBase}，无需更新`)
    return { status: 'noop', reason: 'already-current', serverBase }
  }

  // ── 改写 ──
  progress.stage = 'rewrite'
  console.log(`\n[改写] ${serverBase} → ${next}`)
  const result = rewritePlaylist(raw, serverBase, next)
  // serverBase 来自同一份文本且其后必有 /，正常情况下一定会替换；这里只是兜底
  if (!result.changed) {
    console.log(`[改写] 没有找到需要替换的链接，${config.playlistFile} 保持不变`)
    return { status: 'noop', reason: 'nothing-replaced', serverBase }
  }
  result.updated.forEach(name => console.log(`  已更新：${name}`))

  if (config.dryRun) {
    console.log(`[改写] dry run：${result.updated.length} 条链接将被更新，未写入文件`)
  } else {
    fs.writeFileSync(config.playlistFile, result.text, 'utf-8')
    console.log(`[改写] 已写入 ${config.playlistFile}`)
  }
  return { status: 'updated', from: serverBase, to: next, updated: result.updated, written: !config.dryRun }
}

/**
 * 提取 → 探测 → 比较 → 改写。
 * 预期内的失败都转成 aborted 结果，播放列表不会被改动；其余异常照常抛出。
 */
export async function updateServer(config: MirrorConfig, deps: UpdateDeps = {}): Promise<UpdateOutcome> {
  const progress: { stage: Stage } = { stage: 'extract' }
  try {
    return await runStages(config, deps, progress)
  } catch (err) {
    if (!isMirrorError(err)) throw err
    console.error(`错误：${err.message}`)
    return { status: 'aborted', reason: err.kind, message: err.message, stage: progress.stage }
  }
}

/** 0 = 已更新或无需更新，1 = 提取阶段失败，2 = 没有可用服务器 */
export function exitCodeFor(outcome: UpdateOutcome): number {
  if (outcome.status !== 'aborted') return 0
  return outcome.stage === 'extract' ? 1 : 2
}
