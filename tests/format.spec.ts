import { humanReadableSize, shortId } from '@/format'

describe('Test Size Formatting', () => {
  it('Will pick the largest unit', () => {
    expect(humanReadableSize(0)).toBe('0 B')
    expect(humanReadableSize(1023)).toBe('1023 B')
    expect(humanReadableSize(1024)).toBe('1 KB')
    expect(humanReadableSize(4096)).toBe('4 KB')
    expect(humanReadableSize(2 * 1024 * 1024)).toBe('2 MB')
    expect(humanReadableSize(2147483648)).toBe('2 GB')
    expect(humanReadableSize(1024 ** 4)).toBe('1 TB')
  })

  it('Will truncate at every step', () => {
    expect(humanReadableSize(1536)).toBe('1 KB')
    expect(humanReadableSize(1024 * 1024 - 1)).toBe('1023 KB')
  })

  it('Will stop at TB', () => {
    expect(humanReadableSize(1024 ** 5)).toBe('1024 TB')
  })

  it('Will shorten ids', () => {
    expect(shortId('0f8fad5b-d9cb-469f-a165-70867728950e')).toBe('0f8fad')
    expect(shortId('abc')).toBe('abc')
    expect(shortId('0f8fad5b', 3)).toBe('0f8')
  })
})
