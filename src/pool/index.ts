import { FixedPool } from './fixed.pool'
import { VariablePool } from './variable.pool'
import { PoolOptions, usize, VariablePoolOptions } from './share'
export { FixedPool } from './fixed.pool'
export { VariablePool } from './variable.pool'
export { ConfigError, AssertionError } from './assertions'
export {
  Block,
  BlockId,
  Chunk,
  ChunkId,
  FixedPoolSummary,
  FreeStatus,
  OwnedBlocks,
  OwnedChunks,
  OwnerId,
  Pool,
  PoolEvent,
  PoolListener,
  PoolOptions,
  VariablePoolOptions,
  VariablePoolSummary
} from './share'

export const NewFixedPool = (totalSize: usize, blockSize: usize, options?: PoolOptions): FixedPool => {
  return new FixedPool(totalSize, blockSize, options)
}

export const NewVariablePool = (totalSize: usize, allowedSizes: usize[], options?: VariablePoolOptions): VariablePool => {
  return new VariablePool(totalSize, allowedSizes, options)
}
