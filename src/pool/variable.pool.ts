import { uuid } from 'uuidv4'
import { Chunk, ChunkId, FreeStatus, isSize, OwnedChunks, OwnerId, Pool, PoolEvent, usize, VariablePoolOptions, VariablePoolSummary } from './share'
import { PoolAssertions } from './assertions'
import { logg, Level } from '../log'

const copyOf = (chunk: Chunk): Chunk => ({ ...chunk })

const sum = (chunks: Chunk[]) => chunks.reduce((acc, c) => acc + c.size, 0)

/**
 * Pool of a fixed byte capacity, carved on demand into chunks whose sizes come from a menu.
 *
 * The menu is kept in the order it was given and that order drives {@link VariablePool.allocate}:
 * a menu listed largest first packs greedily, any other order gives a different (and usually worse)
 * layout.
 */
export class VariablePool implements Pool<ChunkId> {
  readonly totalCapacity: usize
  private remaining: usize
  private readonly menu: usize[]
  private readonly table: Chunk[]
  private readonly nextId: () => ChunkId
  private readonly opts: VariablePoolOptions

  constructor (totalSize: usize, allowedSizes: usize[], options: VariablePoolOptions = {}) {
    if (!isSize(totalSize) || totalSize === 0) {
      PoolAssertions.emptyCapacity(totalSize)
    }
    if (allowedSizes.length === 0) {
      PoolAssertions.emptyMenu()
    }
    allowedSizes.forEach((sz, i) => {
      if (!isSize(sz) || sz === 0) {
        PoolAssertions.invalidMenuEntry(i, sz)
      }
    })

    this.totalCapacity = totalSize
    this.remaining = totalSize
    this.menu = [...allowedSizes]
    this.table = []
    this.nextId = options.idGenerator ?? uuid
    this.opts = options

    logg(`VariablePool: ${totalSize} bytes, menu [${this.menu.join(', ')}]`, Level.DEBUG)
  }

  public get remainingCapacity () {
    return this.remaining
  }

  public get allocatedBytes () {
    return this.totalCapacity - this.remaining
  }

  public get allowedSizes (): usize[] {
    return [...this.menu]
  }

  public get freePercentage () {
    return Math.round(this.remaining / this.totalCapacity * 100)
  }

  /**
   * Grants floor(size / blockSize) chunks of exactly blockSize. Whatever of size does not fill a
   * whole chunk is dropped.
   *
   * @returns the new chunks, or null when blockSize is not on the menu or size does not fit
   */
  public allocateSingleSize (size: usize, owner: OwnerId, blockSize: usize): Chunk[] | null {
    if (!isSize(size)) {
      return this.rejected(`invalid request ${size}`, owner)
    }
    if (size > this.totalCapacity) {
      return this.rejected(`request ${size} exceeds capacity ${this.totalCapacity}`, owner)
    }
    if (!this.menu.includes(blockSize)) {
      return this.rejected(`block size ${blockSize} is not on the menu`, owner)
    }

    if (this.remaining === 0) {
      return this.rejected('pool is exhausted', owner)
    } else if (this.remaining < size) {
      return this.rejected(`request ${size} exceeds remaining ${this.remaining}`, owner)
    }

    const count = Math.floor(size / blockSize)

    const granted: Chunk[] = []
    for (let i = 0; i < count; i++) {
      const chunk: Chunk = { id: this.nextId(), size: blockSize, owner, allocated: true }
      this.table.push(chunk)
      granted.push(copyOf(chunk))
      this.remaining -= blockSize
    }

    if (granted.length > 0) {
      logg(`VariablePool: ${owner} got ${count} x ${blockSize}`, Level.DEBUG)
      this.changed({ type: 'allocate', owner, ids: granted.map(c => c.id), bytes: count * blockSize })
    }

    return granted
  }

  /**
   * Greedy decomposition of size over the menu, walked in stored order. A leftover smaller than the
   * last menu entry is rounded up to one chunk of that entry. Pieces that cannot be granted are
   * skipped, so the result may cover less than size, or nothing at all.
   */
  public allocate (size: usize, owner: OwnerId): Chunk[] {
    const results: Chunk[] = []

    if (!isSize(size)) {
      this.rejected(`invalid request ${size}`, owner)
      return results
    }

    const last = this.menu[this.menu.length - 1]
    let left = size

    for (const current of this.menu) {
      if (left <= 0) {
        break
      }

      const [request, blockSize] = left < last
        ? [last, last]
        : [Math.floor(left / current) * current, current]

      if (request === 0) {
        continue
      }

      const granted = this.allocateSingleSize(request, owner, blockSize)
      if (granted !== null) {
        for (const chunk of granted) {
          results.push(chunk)
        }
        left -= sum(granted)
      }
    }

    return results
  }

  public release (id: ChunkId, owner: OwnerId): FreeStatus {
    const i = this.table.findIndex(c => c.id === id)

    if (i < 0) {
      return FreeStatus.NotFound
    }

    const chunk = this.table[i]
    if (chunk.owner !== owner) {
      return FreeStatus.Unauthorized
    }

    this.table.splice(i, 1)
    this.remaining += chunk.size

    logg(`VariablePool: ${owner} released ${id} (${chunk.size})`, Level.DEBUG)

    this.changed({ type: 'free', owner, id, bytes: chunk.size })

    return FreeStatus.Released
  }

  public free (id: ChunkId, owner: OwnerId): boolean {
    const status = this.release(id, owner)

    if (status !== FreeStatus.Released) {
      logg(`VariablePool: ${owner} cannot free ${id} (status ${status})`, Level.DEBUG)
    }

    return status === FreeStatus.Released
  }

  public freeAll (owner: OwnerId): boolean {
    let fails = 0

    const ids = this.table.filter(c => c.owner === owner).map(c => c.id)

    for (const id of ids) {
      if (!this.free(id, owner)) {
        fails++
      }
    }

    return fails === 0
  }

  public chunk (id: ChunkId): Chunk | null {
    const chunk = this.table.find(c => c.id === id)

    return chunk === undefined ? null : copyOf(chunk)
  }

  public chunks (): Chunk[] {
    return this.table.map(copyOf)
  }

  public ownedBy (owner: OwnerId): OwnedChunks {
    const chunks = this.table.filter(c => c.owner === owner).map(copyOf)

    return {
      owner,
      chunks,
      count: chunks.length,
      totalBytes: sum(chunks)
    }
  }

  public summary (): VariablePoolSummary {
    return {
      totalCapacity: this.totalCapacity,
      remainingCapacity: this.remaining,
      allocatedBytes: this.allocatedBytes,
      chunkCount: this.table.length,
      freePercentage: this.freePercentage
    }
  }

  private rejected (reason: string, owner: OwnerId) {
    logg(`VariablePool: rejected ${owner}, ${reason}`, Level.DEBUG)

    return null
  }

  private changed (event: PoolEvent) {
    if (this.opts.validating) {
      this.check()
    }
    this.opts.listener?.(event)
  }

  private check () {
    for (const chunk of this.table) {
      if (!this.menu.includes(chunk.size)) {
        PoolAssertions.foreignChunkSize(chunk.id, chunk.size)
      }
    }

    const allocated = sum(this.table)
    if (allocated + this.remaining !== this.totalCapacity) {
      PoolAssertions.capacityMismatch(allocated, this.remaining, this.totalCapacity)
    }
  }
}
