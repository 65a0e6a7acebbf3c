/**
 * Unit tests for the confirmation prompt
 */

import { describe, it, before, after } from 'node:test'
import { promptConfirm } from '../../cli/ui/prompts'
import { assertEqual } from '../utils/assertions'

describe('promptConfirm', () => {
  let stdinIsTTY: boolean

  before(() => {
    stdinIsTTY = process.stdin.isTTY
    process.stdin.isTTY = false
  })

  after(() => {
    process.stdin.isTTY = stdinIsTTY
  })

  it('should answer no without asking when stdin is not a terminal', async () => {
    assertEqual(
      await promptConfirm('Installer downloaded. Run now?', true),
      false,
      'Non-interactive answer',
    )
  })
})
