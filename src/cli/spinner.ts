/**
 * CLI Spinner 封装
 */

import ora, { type Ora } from 'ora'

export interface Spinner {
  start(text?: string): void
  stop(): void
  succeed(text?: string): void
  fail(text?: string): void
  text(text: string): void
}

let activeSpinner: Ora | null = null

export function createSpinner(text?: string): Spinner {
  const spinner = ora({
    text,
    spinner: 'dots',
    // 测试中不写 stderr
    isSilent: process.env.NODE_ENV === 'test',
  })

  return {
    start(newText?: string) {
      if (activeSpinner) {
        activeSpinner.stop()
      }
      if (newText) spinner.text = newText
      activeSpinner = spinner.start()
    },
    stop() {
      spinner.stop()
      activeSpinner = null
    },
    succeed(newText?: string) {
      spinner.succeed(newText)
      activeSpinner = null
    },
    fail(newText?: string) {
      spinner.fail(newText)
      activeSpinner = null
    },
    text(newText: string) {
      spinner.text = newText
    },
  }
}
