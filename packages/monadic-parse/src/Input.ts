/** Input sources for parsers
 *
 * Parsers see their input only through the three methods of ParserInput.
 * Inputs are immutable: rest() returns a new input, and never changes the receiver.
 *
 * Three input kinds are provided:
 *  StringInput walks the UTF-16 code units of a string (as string indexing does).
 *  ArrayInput walks a list of tokens.
 *  StreamInput pulls elements lazily from an iterator (each element is pulled once).
 *    A StreamInput over a string sees code points (as string iteration does).
 */

/** a source of elements for a parser */
export interface ParserInput<E> {
  isEmpty(): boolean;

  /** @throws EmptyInputError if the input is empty */
  first(): E;

  /** @return the input following the first element
   * @throws EmptyInputError if the input is empty */
  rest(): ParserInput<E>;
}

/** thrown on calls to first() or rest() on an empty input.
 * (a caller bug, not a parse failure. Check isEmpty() first) */
export class EmptyInputError extends Error {
  constructor(operation: "first" | "rest") {
    super(`${operation}() called on empty input`);
    this.name = "EmptyInputError";
  }
}

/** UTF-16 code units of a string, starting at an index.
 * (characters outside the BMP are two elements, use toInput([...str]) for code points) */
export class StringInput implements ParserInput<string> {
  constructor(
    readonly src: string,
    readonly position = 0
  ) {}

  isEmpty(): boolean {
    return this.position >= this.src.length;
  }

  first(): string {
    if (this.isEmpty()) throw new EmptyInputError("first");
    return this.src[this.position];
  }

  rest(): StringInput {
    if (this.isEmpty()) throw new EmptyInputError("rest");
    return new StringInput(this.src, this.position + 1);
  }
}

/** elements of an array (e.g. tokens from a lexer), starting at an index */
export class ArrayInput<E> implements ParserInput<E> {
  constructor(
    readonly elems: readonly E[],
    readonly position = 0
  ) {}

  isEmpty(): boolean {
    return this.position >= this.elems.length;
  }

  first(): E {
    if (this.isEmpty()) throw new EmptyInputError("first");
    return this.elems[this.position];
  }

  rest(): ArrayInput<E> {
    if (this.isEmpty()) throw new EmptyInputError("rest");
    return new ArrayInput(this.elems, this.position + 1);
  }
}

/** One element pulled from an iterator, along with the cell for the element after it.
 * Cells are filled at most once, so every StreamInput sharing a cell sees the same elements. */
class StreamCell<E> {
  private pulled: IteratorResult<E> | undefined;
  private following: StreamCell<E> | undefined;

  constructor(private readonly iterator: Iterator<E>) {}

  head(): IteratorResult<E> {
    if (!this.pulled) {
      this.pulled = this.iterator.next();
    }
    return this.pulled;
  }

  next(): StreamCell<E> {
    this.head(); // the iterator must advance past our element first
    if (!this.following) {
      this.following = new StreamCell(this.iterator);
    }
    return this.following;
  }
}

/** elements pulled on demand from an iterable (e.g. a generator) */
export class StreamInput<E> implements ParserInput<E> {
  private constructor(private readonly cell: StreamCell<E>) {}

  static from<E>(source: Iterable<E>): StreamInput<E> {
    return new StreamInput(new StreamCell(source[Symbol.iterator]()));
  }

  isEmpty(): boolean {
    return this.cell.head().done === true;
  }

  first(): E {
    const head = this.cell.head();
    if (head.done) throw new EmptyInputError("first");
    return head.value;
  }

  rest(): StreamInput<E> {
    if (this.isEmpty()) throw new EmptyInputError("rest");
    return new StreamInput(this.cell.next());
  }
}

/** create a parser input from a string, an array or another iterable */
export function toInput(src: string): StringInput;
export function toInput<E>(src: readonly E[]): ArrayInput<E>;
export function toInput<E>(src: Iterable<E>): StreamInput<E>;
export function toInput<E>(
  src: string | readonly E[] | Iterable<E>
): ParserInput<string> | ParserInput<E> {
  if (typeof src === "string") {
    return new StringInput(src);
  } else if (Array.isArray(src)) {
    return new ArrayInput<E>(src);
  }
  return StreamInput.from(src);
}

/** @return the elements remaining in an input (up to limit elements) */
export function inputElements<E>(input: ParserInput<E>, limit = Infinity): E[] {
  const elems: E[] = [];
  let current = input;
  while (elems.length < limit && !current.isEmpty()) {
    elems.push(current.first());
    current = current.rest();
  }
  return elems;
}

/** @return the remaining text of a character or string token input */
export function inputText(input: ParserInput<string>): string {
  return inputElements(input).join("");
}
