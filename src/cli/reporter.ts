import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {BuildEvent, BuildFailedEvent, BuildSucceededEvent, Reporter} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private spinner?: Ora

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_SUBMITTED': {
        this.spin(`Build ${chalk.cyan(event.build.name)} submitted`)
        break
      }

      case 'BUILD_EXISTS': {
        this.spin(`Build ${chalk.cyan(event.build.name)} already exists${event.phase ? ` (${event.phase})` : ''}`)
        break
      }

      case 'BUILD_RETRYING': {
        this.note(chalk.yellow('↻'), chalk.yellow(`Retrying ${event.build.name} after infrastructure failure${event.reason ? ` (${event.reason})` : ''}`))
        break
      }

      case 'BUILD_POLL_FAILED': {
        this.note(chalk.yellow('!'), chalk.yellow(`Could not read ${event.build.name}: ${event.error}`))
        break
      }

      case 'BUILD_SUCCEEDED': {
        this.handleSucceeded(event)
        break
      }

      case 'BUILD_FAILED': {
        this.handleFailed(event)
        break
      }

      case 'DIAGNOSTICS_FAILED': {
        this.note(chalk.gray('·'), chalk.gray(`No ${event.what} for ${event.build.name}: ${event.error}`))
        break
      }
    }
  }

  private spin(text: string): void {
    if (this.spinner) {
      this.spinner.text = text
      return
    }

    this.spinner = ora({text, prefixText: ' '}).start()
  }

  /** Prints a line above the running spinner. */
  private note(symbol: string, text: string): void {
    if (this.spinner) {
      this.spinner.clear()
      console.log(`  ${symbol} ${text}`)
      this.spinner.render()
    } else {
      console.log(`  ${symbol} ${text}`)
    }
  }

  private stop(symbol: string, text: string): void {
    if (this.spinner) {
      this.spinner.stopAndPersist({symbol, text})
      this.spinner = undefined
    } else {
      console.log(`  ${symbol} ${text}`)
    }
  }

  private handleSucceeded(event: BuildSucceededEvent): void {
    const suffix = event.alreadyComplete ? ', already complete' : ''
    this.stop(chalk.green('✓'), chalk.green(`${event.build.name} (${formatDuration(event.durationMs)}${suffix})`))
  }

  private handleFailed(event: BuildFailedEvent): void {
    const reason = event.reason ? `, ${event.reason}` : ''
    this.stop(chalk.red('✗'), chalk.red(`${event.build.name} (${event.phase}${reason})`))
  }
}
