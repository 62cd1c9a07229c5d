import fs from 'fs'

import { MirrorError } from './errors'

/** 去空白、去末尾斜杠，丢弃空行和 # 注释行；保持原顺序（即探测优先级） */
export function normalizeServers(lines: string[]): string[] {
  return lines
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'))
    .map(line => line.replace(/\/+$/, ''))
    .filter(line => line.length > 0)
}

export function loadServers(filepath: string): string[] {
  if (!fs.existsSync(filepath)) {
    throw new MirrorError('FileNotFound', `服务器列表文件不存在: ${filepath}`)
  }
  return normalizeServers(fs.readFileSync(filepath, 'utf-8').split(/\r?\n/))
}
