import { Block, BlockId, FixedPoolSummary, FreeStatus, isSize, OwnedBlocks, OwnerId, Pool, PoolEvent, PoolOptions, usize } from './share'
import { PoolAssertions } from './assertions'
import { logg, Level } from '../log'

const copyOf = (block: Block): Block => ({ ...block })

/**
 * Pool of equal-size blocks kept in a flat table. Blocks are identified by their
 * position and handed out first-fit, lowest index first.
 */
export class FixedPool implements Pool<BlockId> {
  readonly totalSize: usize
  readonly blockSize: usize
  readonly totalBlocks: number
  private remaining: number
  private readonly table: Block[]
  private readonly opts: PoolOptions

  constructor (totalSize: usize, blockSize: usize, options: PoolOptions = {}) {
    if (!isSize(blockSize) || blockSize === 0) {
      PoolAssertions.invalidBlockSize(blockSize)
    }
    if (!isSize(totalSize)) {
      PoolAssertions.invalidTotalSize(totalSize)
    }

    this.totalSize = totalSize
    this.blockSize = blockSize
    this.totalBlocks = Math.floor(totalSize / blockSize)
    this.remaining = this.totalBlocks
    this.opts = options

    this.table = []
    for (let id = 0; id < this.totalBlocks; id++) {
      this.table.push({ id, allocated: false, owner: null })
    }

    logg(`FixedPool: ${this.totalBlocks} blocks of ${blockSize} (${totalSize - this.totalBlocks * blockSize} bytes unaddressable)`, Level.DEBUG)
  }

  public get remainingBlocks () {
    return this.remaining
  }

  public get allocatedBlocks () {
    return this.totalBlocks - this.remaining
  }

  /**
   * Claims floor(size / blockSize) blocks for owner. The part of size that does not fill a whole
   * block is not allocated, and a request smaller than one block succeeds without claiming anything.
   *
   * @returns false when the request is larger than the pool or than what is left
   */
  public allocate (size: usize, owner: OwnerId): boolean {
    if (!isSize(size)) {
      return this.rejected(`invalid request ${size}`, owner)
    }
    if (size > this.totalSize) {
      return this.rejected(`request ${size} exceeds pool size ${this.totalSize}`, owner)
    }

    const wanted = Math.floor(size / this.blockSize)

    if (this.remaining === 0) {
      return this.rejected('pool is exhausted', owner)
    } else if (this.remaining < wanted) {
      return this.rejected(`${wanted} blocks requested, ${this.remaining} left`, owner)
    }

    const ids: BlockId[] = []
    for (const block of this.table) {
      if (ids.length === wanted) {
        break
      }
      if (!block.allocated) {
        block.allocated = true
        block.owner = owner
        ids.push(block.id)
        this.remaining--
      }
    }

    logg(`FixedPool: ${owner} claimed [${ids.join(', ')}]`, Level.DEBUG)

    this.changed({ type: 'allocate', owner, ids, bytes: ids.length * this.blockSize })

    return true
  }

  public release (id: BlockId, owner: OwnerId): FreeStatus {
    if (!Number.isInteger(id) || id < 0 || id >= this.totalBlocks) {
      return FreeStatus.NotFound
    }

    const block = this.table[id]

    if (!block.allocated) {
      return FreeStatus.NotAllocated
    } else if (block.owner !== owner) {
      return FreeStatus.Unauthorized
    }

    block.allocated = false
    block.owner = null
    this.remaining++

    logg(`FixedPool: ${owner} released block ${id}`, Level.DEBUG)

    this.changed({ type: 'free', owner, id, bytes: this.blockSize })

    return FreeStatus.Released
  }

  public free (id: BlockId, owner: OwnerId): boolean {
    const status = this.release(id, owner)

    if (status !== FreeStatus.Released) {
      logg(`FixedPool: ${owner} cannot free block ${id} (status ${status})`, Level.DEBUG)
    }

    return status === FreeStatus.Released
  }

  public freeAll (owner: OwnerId): boolean {
    let fails = 0

    for (const block of this.table) {
      if (block.owner === owner && !this.free(block.id, owner)) {
        fails++
      }
    }

    return fails === 0
  }

  public block (id: BlockId): Block | null {
    const block = this.table[id]

    return block === undefined ? null : copyOf(block)
  }

  public blocks (): Block[] {
    return this.table.map(copyOf)
  }

  public ownedBy (owner: OwnerId): OwnedBlocks {
    const ids = this.table.filter(b => b.owner === owner).map(b => b.id)

    return {
      owner,
      ids,
      count: ids.length,
      totalBytes: ids.length * this.blockSize
    }
  }

  public summary (): FixedPoolSummary {
    return {
      totalSize: this.totalSize,
      blockSize: this.blockSize,
      totalBlocks: this.totalBlocks,
      remainingBlocks: this.remaining,
      allocatedBlocks: this.allocatedBlocks
    }
  }

  private rejected (reason: string, owner: OwnerId) {
    logg(`FixedPool: rejected ${owner}, ${reason}`, Level.DEBUG)

    return false
  }

  private changed (event: PoolEvent) {
    if (this.opts.validating) {
      this.check()
    }
    this.opts.listener?.(event)
  }

  private check () {
    let allocated = 0
    for (const block of this.table) {
      if (block.allocated) {
        allocated++
        if (block.owner === null) {
          PoolAssertions.ownerlessBlock(block.id)
        }
      } else if (block.owner !== null) {
        PoolAssertions.strayOwner(block.id)
      }
    }

    if (allocated + this.remaining !== this.totalBlocks) {
      PoolAssertions.blocksMismatch(allocated, this.remaining, this.totalBlocks)
    }
  }
}
