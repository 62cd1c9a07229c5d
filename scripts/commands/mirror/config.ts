import {
  MAX_WORKING_SERVERS,
  PLAYLIST_FILE,
  POLICY_TIMING,
  SERVER_LIST_FILE,
  TARGET_DOMAIN,
  type PolicyTiming,
  type ProbePolicy,
} from './constants'
import { MirrorError } from './errors'

export interface MirrorEnv {
  MIRROR_PLAYLIST?: string
  MIRROR_SERVERS?: string
  MIRROR_DOMAIN?: string
  MIRROR_POLICY?: string
  MIRROR_MAX_WORKING?: string
  MIRROR_DRY_RUN?: string
}

export interface MirrorConfig {
  playlistFile: string
  serverListFile: string
  targetDomain: string
  policy: ProbePolicy
  /** first-success 下恒为 1 */
  maxWorking: number
  timing: PolicyTiming
  dryRun: boolean
}

const POLICIES: readonly ProbePolicy[] = ['first-success', 'all-paths']

function isPolicy(value: string): value is ProbePolicy {
  return POLICIES.some(p => p === value)
}

function parsePolicy(raw: string | undefined): ProbePolicy {
  const value = raw?.trim()
  if (!value) return 'first-success'
  if (!isPolicy(value)) {
    throw new MirrorError('InvalidConfig', `MIRROR_POLICY 无效: "${value}"（可选 ${POLICIES.join(' / ')}）`)
  }
  return value
}

function parseMaxWorking(raw: string | undefined): number {
  const value = raw?.trim()
  if (!value) return MAX_WORKING_SERVERS
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new MirrorError('InvalidConfig', `MIRROR_MAX_WORKING 必须是正整数: "${value}"`)
  }
  return n
}

function parseFlag(raw: string | undefined): boolean {
  return ['1', 'true', 'yes'].includes((raw ?? '').trim().toLowerCase())
}

export function parseConfig(env: MirrorEnv): MirrorConfig {
  const policy = parsePolicy(env.MIRROR_POLICY)
  const maxWorking = parseMaxWorking(env.MIRROR_MAX_WORKING)

  return {
    playlistFile: env.MIRROR_PLAYLIST?.trim() || PLAYLIST_FILE,
    serverListFile: env.MIRROR_SERVERS?.trim() || SERVER_LIST_FILE,
    targetDomain: env.MIRROR_DOMAIN?.trim() || TARGET_DOMAIN,
    policy,
    maxWorking: policy === 'first-success' ? 1 : maxWorking,
    timing: POLICY_TIMING[policy],
    dryRun: parseFlag(env.MIRROR_DRY_RUN),
  }
}
