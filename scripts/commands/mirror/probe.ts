/**
 * mirror/probe.ts
 *
 * 逐个探测候选镜像。两种策略：
 *   first-success：只测一个频道路径，第一个返回 200 的服务器即选中，后面不再探测
 *   all-paths：    每个频道路径都要返回 200，任一路径失败即放弃该服务器
 *
 * 全程串行，不重试；每次请求之间有固定间隔，避免给服务器造成压力。
 */

import axios from 'axios'
import { detectSeries, everySeries } from 'async'
import type { Readable } from 'stream'
import { setTimeout as delay } from 'timers/promises'

import { USER_AGENT, type PolicyTiming, type ProbePolicy } from './constants'

export interface ProbeResult {
  url: string
  ok: boolean
  status?: number
  /** 网络层错误码，如 ECONNREFUSED / ENOTFOUND；超时统一为 ETIMEDOUT */
  error?: string
}

export type ProbeFn = (url: string, timeoutMs: number) => Promise<ProbeResult>

export interface ProberOptions {
  policy: ProbePolicy
  maxWorking: number
  timing: PolicyTiming
  probe?: ProbeFn
  sleep?: (ms: number) => Promise<void>
}

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']

function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.code && TIMEOUT_CODES.includes(err.code)) return 'ETIMEDOUT'
    return err.code ?? err.message
  }
  if (err instanceof Error) return err.name
  return String(err)
}

export async function probeUrl(url: string, timeoutMs: number): Promise<ProbeResult> {
  try {
    // 只看状态码：拿到响应头就结束，不读 body；signal 限定整个请求（含重定向）的总时长
    const resp = await axios.get<Readable>(url, {
      timeout: timeoutMs,
      signal: AbortSignal.timeout(timeoutMs),
      maxRedirects: 5,
      responseType: 'stream',
      headers: { 'User-Agent': USER_AGENT },
      validateStatus: () => true,
    })
    resp.data.destroy()
    return { url, ok: resp.status === 200, status: resp.status }
  } catch (err) {
    return { url, ok: false, error: describeError(err) }
  }
}

function logFailure(server: string, result: ProbeResult) {
  if (result.status !== undefined) {
    console.log(`[探测] 失败 ${server}：${result.url} 返回 ${result.status}`)
  } else {
    console.log(`[探测] 失败 ${server}：连接失败或超时（${result.error ?? 'unknown'}）`)
  }
}

async function firstSuccess(
  servers: string[],
  testPath: string,
  opts: Required<Pick<ProberOptions, 'probe' | 'sleep' | 'timing'>>,
): Promise<string[]> {
  let tried = 0
  const found: string | undefined = await detectSeries(servers, async (server: string) => {
    if (tried++ > 0) await opts.sleep(opts.timing.serverDelayMs)
    const result = await opts.probe(server + testPath, opts.timing.timeoutMs)
    if (result.ok) {
      console.log(`[探测] 成功 ${server}：测试频道可正常访问`)
      return true
    }
    logFailure(server, result)
    return false
  })
  return found ? [found] : []
}

async function allPaths(
  servers: string[],
  paths: string[],
  maxWorking: number,
  opts: Required<Pick<ProberOptions, 'probe' | 'sleep' | 'timing'>>,
): Promise<string[]> {
  const working: string[] = []

  for (const [index, server] of servers.entries()) {
    if (index > 0) await opts.sleep(opts.timing.serverDelayMs)

    let first = true
    const passed = await everySeries(paths, async (channelPath: string) => {
      if (!first) await opts.sleep(opts.timing.pathDelayMs)
      first = false
      const result = await opts.probe(server + channelPath, opts.timing.timeoutMs)
      if (!result.ok) logFailure(server, result)
      return result.ok
    })

    if (passed) {
      console.log(`[探测] 成功 ${server}：全部 ${paths.length} 个频道可正常访问`)
      working.push(server)
      if (working.length >= maxWorking) break
    }
  }

  return working
}

/**
 * 按候选顺序返回可用的 server base，最多 maxWorking 个（first-success 下最多 1 个）。
 * first-success 使用 paths[0] 作为测试频道。
 */
export async function findWorkingServers(
  servers: string[],
  paths: string[],
  options: ProberOptions,
): Promise<string[]> {
  if (servers.length === 0 || paths.length === 0) return []

  const opts = {
    probe: options.probe ?? probeUrl,
    sleep: options.sleep ?? (async (ms: number) => { await delay(ms) }),
    timing: options.timing,
  }

  if (options.policy === 'first-success') {
    console.log(`\n[探测] 开始检查 ${servers.length} 个候选服务器（测试频道 ${paths[0]}）...`)
    return firstSuccess(servers, paths[0], opts)
  }

  console.log(`\n[探测] 开始检查 ${servers.length} 个候选服务器（每个测试 ${paths.length} 个频道）...`)
  return allPaths(servers, paths, Math.max(1, options.maxWorking), opts)
}
