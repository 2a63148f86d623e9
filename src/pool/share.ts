export type OwnerId = string
export type usize = number
export type BlockId = number
export type ChunkId = string

export type Block = {
  id: BlockId
  allocated: boolean
  owner: OwnerId | null
}

export type Chunk = {
  id: ChunkId
  size: usize
  owner: OwnerId
  allocated: true
}

export const enum FreeStatus {
  Released = 0,
  NotFound = 1,
  NotAllocated = 2,
  Unauthorized = 3
}

export type PoolEvent = {
  type: 'allocate'
  owner: OwnerId
  ids: Array<BlockId | ChunkId>
  bytes: usize
} | {
  type: 'free'
  owner: OwnerId
  id: BlockId | ChunkId
  bytes: usize
}

export type PoolListener = (event: PoolEvent) => void

export type PoolOptions = {
  /**
   * Called after every successful mutation, so a renderer can pull a fresh snapshot.
   */
  listener?: PoolListener

  /**
   * Re-check the pool invariant after every mutation. Throws an AssertionError when bookkeeping is corrupt.
   */
  validating?: boolean
}

export type VariablePoolOptions = PoolOptions & {
  idGenerator?: () => ChunkId
}

export type FixedPoolSummary = {
  totalSize: usize
  blockSize: usize
  totalBlocks: number
  remainingBlocks: number
  allocatedBlocks: number
}

export type VariablePoolSummary = {
  totalCapacity: usize
  remainingCapacity: usize
  allocatedBytes: usize
  chunkCount: number
  freePercentage: number
}

export type OwnedBlocks = {
  owner: OwnerId
  ids: BlockId[]
  count: number
  totalBytes: usize
}

export type OwnedChunks = {
  owner: OwnerId
  chunks: Chunk[]
  count: number
  totalBytes: usize
}

export interface Pool<I extends BlockId | ChunkId> {
  free: (id: I, owner: OwnerId) => boolean

  release: (id: I, owner: OwnerId) => FreeStatus

  freeAll: (owner: OwnerId) => boolean
}

export const isSize = (n: number) => Number.isSafeInteger(n) && n >= 0
