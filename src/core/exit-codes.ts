/**
 * Process exit codes of the phasewright CLI.
 */

import type { RunStatus } from '../modules/phase-machine/types.js'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2
export const EXIT_AWAITING_APPROVAL = 3
export const EXIT_DIVERGENCE = 4
/** The run stopped and can be resumed */
export const EXIT_SUSPENDED = 5

export function exitCodeForStatus(status: RunStatus): number {
  switch (status) {
    case 'done':
      return EXIT_SUCCESS
    case 'awaiting-approval':
      return EXIT_AWAITING_APPROVAL
    case 'divergence':
      return EXIT_DIVERGENCE
    case 'suspended':
      return EXIT_SUSPENDED
  }
}
