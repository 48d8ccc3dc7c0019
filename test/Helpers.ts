import {AssertionError} from 'assert'
import type {Output} from '../src/Cli'

/**
 * Runs `fn`, expecting it to throw an instance of `type`, and returns the
 * thrown error so that its fields can be checked.
 */
export function thrown<E extends Error>(
  type: new (...args: never[]) => E,
  fn: () => unknown
): E {
  try {
    fn()
  } catch (ex) {
    if (ex instanceof type) return ex
    throw ex
  }
  throw new AssertionError({message: `expected a ${type.name} to be thrown`})
}

/** Collects CLI output instead of printing it */
export class Recorder implements Output {
  readonly logs: string[] = []
  readonly errors: string[] = []

  log(message: string) {
    this.logs.push(message)
  }

  error(message: string) {
    this.errors.push(message)
  }
}
