import path from 'path'

const ROOT = path.resolve(__dirname, '../../..')

/** 本地维护的播放列表 */
export const PLAYLIST_FILE = path.join(ROOT, 'playlist.m3u')

/** 候选镜像列表，每行一个 server base，例如 http://fl2.moveonjoy.com */
export const SERVER_LIST_FILE = path.join(ROOT, 'servers.txt')

export const TARGET_DOMAIN = 'moveonjoy.com'

/** all-paths 策略最多收集的可用服务器数 */
export const MAX_WORKING_SERVERS = 5

export const USER_AGENT = 'Mozilla/5.0 (compatible; IPTV mirror checker)'

export type ProbePolicy = 'first-success' | 'all-paths'

export interface PolicyTiming {
  timeoutMs: number
  /** 同一候选的两个路径之间 */
  pathDelayMs: number
  /** 两个候选之间 */
  serverDelayMs: number
}

export const POLICY_TIMING: Record<ProbePolicy, PolicyTiming> = {
  'first-success': { timeoutMs: 10000, pathDelayMs: 0, serverDelayMs: 500 },
  'all-paths': { timeoutMs: 5000, pathDelayMs: 100, serverDelayMs: 500 },
}
