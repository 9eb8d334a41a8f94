#!/usr/bin/env tsx
/**
 * papyrus-d5 command line
 */

import { readFileSync } from 'fs'

import { convertXml, FormattingError, toPlainText } from '@papyrus-d5/core'

import { loadSettings, parseCliArgs } from './config.js'
import { createConsoleLogger } from './logger.js'
import { PapyrusFilter } from './papyrus-filter.js'
import { ConversionRunner } from './runner.js'

const USAGE = `Usage:
  papyrus-d5 <tm|collection>[,...] [--debug] [--ignore-formatting-issues] [--no-json] [--no-txt] [--update] [--reindex]
  papyrus-d5 --filter <dclp|ddb|all> [--title <text>] [--place <text>] [--dclp-hybrid <text>] [--all-match]
  papyrus-d5 convert <file.xml>

Examples:
  papyrus-d5 37203
  papyrus-d5 5015,5016,5017
  papyrus-d5 cpr --ignore-formatting-issues`

const args = process.argv.slice(2)

try {
  const settings = loadSettings(process.env, args)
  const command = parseCliArgs(args)
  const logger = createConsoleLogger('papyrus-d5', { debug: settings.debug })

  switch (command.command) {
    case 'help':
      console.log(USAGE)
      process.exit(args.length === 0 ? 1 : 0)
    case 'convert': {
      const result = convertXml(readFileSync(command.file, 'utf-8'), {
        config: { ignoreFormattingIssues: settings.ignoreFormattingIssues, debugMode: settings.debug },
        logger
      })
      console.log(toPlainText(result))
      break
    }
    case 'filter': {
      const { source, title, place, dclpHybrid, singleMatchSuffices } = command.filter
      const runner = new ConversionRunner(settings, logger)
      runner.prepare()
      const filter = new PapyrusFilter(
        { idpDataDir: settings.idpDataDir, source, title, place, dclpHybrid, singleMatchSuffices },
        logger
      )
      const summary = runner.runTargets(filter)
      logger.info(`Converted ${summary.converted}, skipped ${summary.skipped.length}, output in ${summary.exportDirectory}`)
      break
    }
    case 'run': {
      const summary = new ConversionRunner(settings, logger).runTargets(command.target)
      logger.info(`Converted ${summary.converted}, skipped ${summary.skipped.length}, output in ${summary.exportDirectory}`)
      break
    }
  }
} catch (err) {
  if (err instanceof FormattingError) {
    console.error(err.getSummary())
  } else {
    console.error('Conversion failed:', err instanceof Error ? err.message : err)
  }
  process.exit(1)
}
