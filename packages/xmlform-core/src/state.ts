/**
 * Processor state - the location stack of a single decode/encode call
 *
 * The engine pushes a segment when it enters an element (a child path, a
 * nested array container, `item[i]` for array items) and pops it on the
 * way back out. Errors capture the rendered location at the point of
 * failure.
 */

import { UserFailure, createLocatedError, type LocatedErrorClass } from './errors.js';

/**
 * Read-only state exposed to hooks
 */
export interface ProcessorStateView {
  /**
   * Slash-joined location, e.g. `author/birth-year`
   */
  readonly location: string;

  readonly segments: readonly string[];

  /**
   * Throw an error bundled with the current location
   *
   * @param errorClass Defaults to UserFailure
   */
  raiseError(errorClass?: LocatedErrorClass, message?: string): never;
}

export class ProcessorState implements ProcessorStateView {
  private readonly stack: string[] = [];

  get location(): string {
    return this.segments.join('/');
  }

  get segments(): readonly string[] {
    return this.stack.filter(segment => segment !== '');
  }

  /**
   * Enter a location. An empty segment (self path, embedded array) is
   * kept on the stack so push/pop stay paired, but is not rendered.
   */
  push(segment: string, index?: number): void {
    this.stack.push(index === undefined ? segment : `${segment}[${index}]`);
  }

  pop(): void {
    this.stack.pop();
  }

  /**
   * Run `body` with `segment` pushed, popping it afterwards
   */
  within<T>(segment: string, body: () => T, index?: number): T {
    this.push(segment, index);
    try {
      return body();
    } finally {
      this.pop();
    }
  }

  raiseError(errorClass: LocatedErrorClass = UserFailure, message = 'Invalid value'): never {
    throw createLocatedError(errorClass, message, this.location);
  }

  /**
   * Frozen snapshot for hooks; a hook that keeps the view around never
   * sees later pushes
   */
  view(): ProcessorStateView {
    const location = this.location;
    const segments = Object.freeze(this.segments.slice());
    return Object.freeze({
      location,
      segments,
      raiseError(errorClass: LocatedErrorClass = UserFailure, message = 'Invalid value'): never {
        throw createLocatedError(errorClass, message, location);
      },
    });
  }
}
