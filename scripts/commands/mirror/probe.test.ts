import http from 'http'
import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest'

import { POLICY_TIMING } from './constants'
import { findWorkingServers, probeUrl, type ProbeFn } from './probe'

const A = 'http://fl1.example.com'
const B = 'http://fl2.example.com'
const C = 'http://fl3.example.com'
const PATHS = ['/A/index.m3u8', '/B/index.m3u8', '/C/index.m3u8']

function fakeProbe(okUrls: string[]) {
  const calls: string[] = []
  const probe: ProbeFn = async url => {
    calls.push(url)
    const ok = okUrls.includes(url)
    return { url, ok, status: ok ? 200 : 404 }
  }
  return { probe, calls }
}

function recordSleep() {
  const waits: number[] = []
  const sleep = async (ms: number) => {
    waits.push(ms)
  }
  return { sleep, waits }
}

describe('findWorkingServers', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('first-success', () => {
    const timing = POLICY_TIMING['first-success']

    it('stops at the first server serving the test channel', async () => {
      const { probe, calls } = fakeProbe([B + PATHS[0]])
      const { sleep, waits } = recordSleep()
      const working = await findWorkingServers([A, B, C], PATHS, { policy: 'first-success', maxWorking: 1, timing, probe, sleep })
      expect(working).toEqual([B])
      expect(calls).toEqual([A + PATHS[0], B + PATHS[0]])
      expect(waits).toEqual([500])
    })

    it('returns nothing when every server fails', async () => {
      const { probe, calls } = fakeProbe([])
      const { sleep, waits } = recordSleep()
      const working = await findWorkingServers([A, B, C], PATHS, { policy: 'first-success', maxWorking: 1, timing, probe, sleep })
      expect(working).toEqual([])
      expect(calls).toHaveLength(3)
      expect(waits).toEqual([500, 500])
    })
  })

  describe('all-paths', () => {
    const timing = POLICY_TIMING['all-paths']
    const everything = (server: string) => PATHS.map(p => server + p)

    it('rejects a server on its first failing path', async () => {
      const { probe, calls } = fakeProbe([A + PATHS[0], ...everything(B), ...everything(C)])
      const { sleep, waits } = recordSleep()
      const working = await findWorkingServers([A, B, C], PATHS, { policy: 'all-paths', maxWorking: 5, timing, probe, sleep })
      expect(working).toEqual([B, C])
      expect(calls).toEqual([A + PATHS[0], A + PATHS[1], ...everything(B), ...everything(C)])
      expect(waits).toEqual([100, 500, 100, 100, 500, 100, 100])
    })

    it('rejects a server whose last path fails', async () => {
      const { probe } = fakeProbe([A + PATHS[0], A + PATHS[1], ...everything(B)])
      const { sleep } = recordSleep()
      const working = await findWorkingServers([A, B], PATHS, { policy: 'all-paths', maxWorking: 5, timing, probe, sleep })
      expect(working).toEqual([B])
    })

    it('stops once the cap is reached', async () => {
      const { probe, calls } = fakeProbe([...everything(A), ...everything(B)])
      const { sleep } = recordSleep()
      const working = await findWorkingServers([A, B], PATHS, { policy: 'all-paths', maxWorking: 1, timing, probe, sleep })
      expect(working).toEqual([A])
      expect(calls).toEqual(everything(A))
    })
  })

  it('probes nothing without paths', async () => {
    const { probe, calls } = fakeProbe([])
    const working = await findWorkingServers([A], [], { policy: 'all-paths', maxWorking: 5, timing: POLICY_TIMING['all-paths'], probe })
    expect(working).toEqual([])
    expect(calls).toEqual([])
  })
})

describe('probeUrl', () => {
  const server = http.createServer((req, res) => {
    switch (req.url) {
      case '/ok/index.m3u8':
        res.writeHead(200, { 'Content-Type': 'application/vnd.apple.mpegurl' })
        res.end('#EXTM3U\n')
        break
      case '/moved/index.m3u8':
        res.writeHead(302, { Location: '/ok/index.m3u8' })
        res.end()
        break
      case '/slow/index.m3u8':
        setTimeout(() => res.end('#EXTM3U\n'), 1000)
        break
      case '/live/index.m3u8': {
        res.writeHead(200, { 'Content-Type': 'application/vnd.apple.mpegurl' })
        const timer = setInterval(() => res.write('#EXTINF:6.0,\nsegment.ts\n'.padEnd(64, '#')), 50)
        res.on('close', () => clearInterval(timer))
        break
      }
      default:
        res.writeHead(404)
        res.end()
    }
  })
  let base = ''

  beforeAll(async () => {
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve))
    const addr = server.address()
    if (!addr || typeof addr === 'string') throw new Error('server did not bind a port')
    base = `http://127.0.0.1:${addr.port}`
  })

  afterAll(async () => {
    server.closeAllConnections()
    await new Promise<void>(resolve => server.close(() => resolve()))
  })

  it('accepts 200', async () => {
    expect(await probeUrl(`${base}/ok/index.m3u8`, 2000)).toEqual({ url: `${base}/ok/index.m3u8`, ok: true, status: 200 })
  })

  it('follows redirects', async () => {
    const result = await probeUrl(`${base}/moved/index.m3u8`, 2000)
    expect(result.ok).toBe(true)
    expect(result.status).toBe(200)
  })

  it('fails on other statuses', async () => {
    expect(await probeUrl(`${base}/gone/index.m3u8`, 2000)).toEqual({ url: `${base}/gone/index.m3u8`, ok: false, status: 404 })
  })

  it('fails on timeout', async () => {
    const result = await probeUrl(`${base}/slow/index.m3u8`, 100)
    expect(result.ok).toBe(false)
    expect(result.status).toBeUndefined()
    expect(result.error).toBe('ETIMEDOUT')
  })

  it('returns on the status line without waiting for a body that never ends', async () => {
    const started = Date.now()
    const result = await probeUrl(`${base}/live/index.m3u8`, 300)
    expect(Date.now() - started).toBeLessThan(1000)
    expect(result).toEqual({ url: `${base}/live/index.m3u8`, ok: true, status: 200 })
  })

  it('fails when nothing listens', async () => {
    const closed = http.createServer()
    await new Promise<void>(resolve => closed.listen(0, '127.0.0.1', resolve))
    const addr = closed.address()
    if (!addr || typeof addr === 'string') throw new Error('server did not bind a port')
    await new Promise<void>(resolve => closed.close(() => resolve()))

    const result = await probeUrl(`http://127.0.0.1:${addr.port}/ok/index.m3u8`, 2000)
    expect(result.ok).toBe(false)
    expect(result.error).toBe('ECONNREFUSED')
  })
})
