/**
 * Fetches the papyri.info data repository with git
 */

import { execSync } from 'child_process'
import { existsSync, mkdirSync, rmSync } from 'fs'
import { dirname, join } from 'path'

import { silentLogger, type LoggerMethods } from '@papyrus-d5/core'

import type { Settings } from './config.js'
import { SOURCE_DIRS } from './tm-index.js'

export class DownloadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DownloadError'
  }
}

type DownloaderSettings = Pick<Settings, 'idpDataDir' | 'indexFile' | 'repoUrl'>

export class PapyriDownloader {
  constructor(
    private readonly settings: DownloaderSettings,
    private readonly logger: LoggerMethods = silentLogger
  ) {}

  /**
   * Whether the data directory holds at least one edition source
   */
  isAvailable(): boolean {
    return SOURCE_DIRS.some(sub => existsSync(join(this.settings.idpDataDir, sub)))
  }

  /**
   * Clone the repository, or pull when a checkout exists. Drops the TM
   * index, which no longer matches the files.
   */
  sync(): void {
    const { idpDataDir, indexFile, repoUrl } = this.settings

    try {
      if (existsSync(join(idpDataDir, '.git'))) {
        this.logger.info(`Updating ${idpDataDir}`)
        execSync('git pull --ff-only', { cwd: idpDataDir, stdio: 'inherit' })
      } else {
        this.logger.info(`Cloning ${repoUrl} into ${idpDataDir}`)
        mkdirSync(dirname(idpDataDir), { recursive: true })
        execSync(`git clone --depth 1 "${repoUrl}" "${idpDataDir}"`, { stdio: 'inherit' })
      }
    } catch (e) {
      throw new DownloadError(`Could not fetch ${repoUrl}`, { cause: e })
    }

    if (existsSync(indexFile)) {
      rmSync(indexFile)
    }
  }

  /**
   * Latest commit of one file in the checkout, '' when git has none
   */
  fileCommit(relativePath: string): string {
    try {
      const result = execSync(`git log --format="%H" -1 -- "${relativePath}"`, {
        cwd: this.settings.idpDataDir,
        encoding: 'utf-8'
      })
      return result.trim()
    } catch (e) {
      this.logger.debug(`No commit for ${relativePath}: ${e instanceof Error ? e.message : String(e)}`)
      return ''
    }
  }
}
