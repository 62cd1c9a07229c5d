/**
 * mirror/update-server.ts
 *
 * 播放列表里的频道都挂在某个 fl<N>.<domain> 镜像上，镜像时常下线。
 * 本脚本依次探测 servers.txt 中的候选镜像，找到可用的那个后，
 * 把播放列表中的旧 server base 整体替换为它。
 *
 * 配置（环境变量，均可省略）：
 *   MIRROR_PLAYLIST     播放列表路径，默认 playlist.m3u
 *   MIRROR_SERVERS      候选列表路径，默认 servers.txt
 *   MIRROR_DOMAIN       目标域名
 *   MIRROR_POLICY       first-success（默认）或 all-paths
 *   MIRROR_MAX_WORKING  all-paths 下最多收集几个可用服务器
 *   MIRROR_DRY_RUN      为 1 时只打印，不写文件
 *
 * 退出码：0 已更新或无需更新，1 提取失败，2 没有可用服务器
 *
 * 用法：npm run mirror:update
 */

import { parseConfig } from './config'
import { exitCodeFor, updateServer } from './run'

async function main() {
  const config = parseConfig(process.env)
  console.log(`播放列表：${config.playlistFile}`)
  console.log(`候选列表：${config.serverListFile}`)
  console.log(`探测策略：${config.policy}${config.policy === 'all-paths' ? `（最多 ${config.maxWorking} 个）` : ''}`)

  const outcome = await updateServer(config)

  console.log('\n════════════════════════════════════')
  switch (outcome.status) {
    case 'updated':
      console.log(`${outcome.from} → ${outcome.to}，共更新 ${outcome.updated.length} 条链接${outcome.written ? '' : '（dry run）'}`)
      break
    case 'noop':
      console.log(`无需更新（${outcome.reason}），仍使用 ${outcome.serverBase}`)
      break
    case 'aborted':
      console.log(`已中止（${outcome.reason}）：${outcome.message}`)
      break
  }

  process.exitCode = exitCodeFor(outcome)
}

if (require.main === module) {
  main().catch(e => {
    console.error(e)
    process.exit(1)
  })
}
