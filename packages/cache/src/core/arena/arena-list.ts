import { CacheUsageError } from "../errors"

type Cell<T> = {
  /** Present exactly while the cell is on the occupied list. */
  slot: { value: T } | undefined
  next: number
  prev: number
}

const FREE = 0
const OCCUPIED = 1
const FIRST_DATA_INDEX = 2

/**
 * Array-backed circular doubly linked list.
 *
 * Cells live in one growable array and link by index. Cell 0 heads the free
 * list, cell 1 heads the occupied list; every other cell is on exactly one of
 * the two. Occupied cells iterate front (most recent) to back.
 */
export class ArenaList<T> implements Iterable<T> {
  private cells: Cell<T>[] = []
  private count = 0

  constructor(private readonly capacityHint = 0) {
    this.init()
  }

  size(): number {
    return this.count
  }

  /** Stores `value` at the front and returns its index. */
  pushFront(value: T): number {
    let index = this.at(FREE).next

    if (index === FREE) {
      index = this.cells.length
      this.cells.push({ slot: undefined, next: index, prev: index })
    } else {
      this.unlink(index)
    }

    this.at(index).slot = { value }
    this.linkAfter(index, OCCUPIED)
    this.count++

    return index
  }

  moveToFront(index: number): void {
    this.occupied(index)
    this.unlink(index)
    this.linkAfter(index, OCCUPIED)
  }

  /** Frees the cell at `index` and returns the value it held. */
  remove(index: number): T {
    const cell = this.occupied(index)
    const { value } = this.slotOf(cell, index)

    this.unlink(index)
    cell.slot = undefined
    this.linkAfter(index, FREE)
    this.count--

    return value
  }

  front(): number | undefined {
    const index = this.at(OCCUPIED).next

    return index === OCCUPIED ? undefined : index
  }

  /** Index of the least recently pushed or moved cell. */
  back(): number | undefined {
    const index = this.at(OCCUPIED).prev

    return index === OCCUPIED ? undefined : index
  }

  get(index: number): T {
    return this.slotOf(this.occupied(index), index).value
  }

  /** Replaces the value at `index` in place and returns the previous one. */
  set(index: number, value: T): T {
    const slot = this.slotOf(this.occupied(index), index)
    const previous = slot.value

    slot.value = value

    return previous
  }

  /** Drops every value and restores the initial preallocation. */
  clear(): void {
    this.init()
  }

  *entries(): IterableIterator<[number, T]> {
    for (let index = this.at(OCCUPIED).next; index !== OCCUPIED; ) {
      const cell = this.at(index)

      yield [index, this.slotOf(cell, index).value]
      index = cell.next
    }
  }

  *values(): IterableIterator<T> {
    for (const [, value] of this.entries()) yield value
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values()
  }

  private init(): void {
    this.cells = [
      { slot: undefined, next: FREE, prev: FREE },
      { slot: undefined, next: OCCUPIED, prev: OCCUPIED },
    ]
    this.count = 0

    for (let i = 0; i < this.capacityHint; i++) {
      const index = this.cells.length

      this.cells.push({ slot: undefined, next: index, prev: index })
      this.linkAfter(index, this.at(FREE).prev)
    }
  }

  private linkAfter(index: number, after: number): void {
    const cell = this.at(index)
    const left = this.at(after)
    const right = this.at(left.next)

    cell.prev = after
    cell.next = left.next
    right.prev = index
    left.next = index
  }

  private unlink(index: number): void {
    const cell = this.at(index)

    this.at(cell.prev).next = cell.next
    this.at(cell.next).prev = cell.prev
  }

  private occupied(index: number): Cell<T> {
    const cell = index >= FIRST_DATA_INDEX ? this.cells[index] : undefined

    if (cell?.slot === undefined) {
      throw new CacheUsageError(`Arena index ${index} does not hold a value`, { index })
    }

    return cell
  }

  private slotOf(cell: Cell<T>, index: number): { value: T } {
    if (cell.slot === undefined) {
      throw new CacheUsageError(`Arena index ${index} does not hold a value`, { index })
    }

    return cell.slot
  }

  private at(index: number): Cell<T> {
    const cell = this.cells[index]

    if (cell === undefined) {
      throw new CacheUsageError(`Arena index ${index} is out of range`, { index })
    }

    return cell
  }
}
