export class AssertionError extends Error {

}

export class ConfigError extends Error {

}

export const PoolAssertions = {
  invalidBlockSize: (sz: number) => {
    throw new ConfigError(`Block size ${sz} must be a positive integer`)
  },
  invalidTotalSize: (sz: number) => {
    throw new ConfigError(`Total size ${sz} must be a non-negative integer`)
  },
  emptyCapacity: (sz: number) => {
    throw new ConfigError(`Total capacity ${sz} must be a positive integer`)
  },
  emptyMenu: () => {
    throw new ConfigError('Size menu must hold at least one block size')
  },
  invalidMenuEntry: (i: number, sz: number) => {
    throw new ConfigError(`Size menu entry #${i} (${sz}) must be a positive integer`)
  },
  blocksMismatch: (allocated: number, remaining: number, total: number) => {
    throw new AssertionError(`Allocated blocks ${allocated} plus remaining ${remaining} do not add up to ${total}`)
  },
  ownerlessBlock: (id: number) => {
    throw new AssertionError(`Block ${id} is allocated but has no owner`)
  },
  strayOwner: (id: number) => {
    throw new AssertionError(`Block ${id} is free but still records an owner`)
  },
  capacityMismatch: (allocated: number, remaining: number, total: number) => {
    throw new AssertionError(`Allocated bytes ${allocated} plus remaining ${remaining} do not add up to ${total}`)
  },
  foreignChunkSize: (id: string, sz: number) => {
    throw new AssertionError(`Chunk ${id} has size ${sz}, which is not in the size menu`)
  }
}
