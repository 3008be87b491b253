import { describe, it, expect } from 'vitest'
import { diffSnapshots, isEmptyDiff, countChanges } from './diffSnapshots'
import type { InventoryItem, Snapshot } from '../contracts'

const item = (classid: string, amount: string, instanceid = '0'): InventoryItem => ({
  classid,
  amount,
  instanceid,
})

describe('diffSnapshots', () => {
  it('should report amount changes with old and new values', () => {
    const previous: Snapshot = new Map([['a1', item('1', '2')]])
    const current: Snapshot = new Map([['a1', item('1', '3')]])

    const diff = diffSnapshots(current, previous)

    expect(diff.added.size).toBe(0)
    expect(diff.removed.size).toBe(0)
    expect(Object.fromEntries(diff.changed)).toEqual({
      a1: { oldAmount: '2', newAmount: '3' },
    })
  })

  it('should split keys into added and removed', () => {
    const previous: Snapshot = new Map([
      ['keep', item('1', '1')],
      ['gone', item('2', '1')],
    ])
    const current: Snapshot = new Map([
      ['keep', item('1', '1')],
      ['new', item('3', '5', '7')],
    ])

    const diff = diffSnapshots(current, previous)

    expect(Array.from(diff.added.keys())).toEqual(['new'])
    expect(diff.added.get('new')).toEqual(item('3', '5', '7'))
    expect(Array.from(diff.removed.keys())).toEqual(['gone'])
    expect(diff.removed.get('gone')).toEqual(item('2', '1'))
    expect(diff.changed.size).toBe(0)
  })

  it('should partition the symmetric difference and keep changed inside the intersection', () => {
    const previous: Snapshot = new Map([
      ['a', item('1', '1')],
      ['b', item('2', '1')],
      ['c', item('3', '4')],
    ])
    const current: Snapshot = new Map([
      ['b', item('2', '2')],
      ['c', item('3', '4')],
      ['d', item('4', '1')],
      ['e', item('5', '1')],
    ])

    const diff = diffSnapshots(current, previous)
    const added = new Set(diff.added.keys())
    const removed = new Set(diff.removed.keys())

    expect(added).toEqual(new Set(['d', 'e']))
    expect(removed).toEqual(new Set(['a']))
    for (const key of added) {
      expect(removed.has(key)).toBe(false)
    }
    for (const key of diff.changed.keys()) {
      expect(previous.has(key) && current.has(key)).toBe(true)
    }
    expect(Array.from(diff.changed.keys())).toEqual(['b'])
  })

  it('should find nothing when comparing a snapshot with itself', () => {
    const snapshot: Snapshot = new Map([
      ['a', item('1', '1')],
      ['b', item('2', '9', '3')],
    ])

    const diff = diffSnapshots(snapshot, snapshot)

    expect(isEmptyDiff(diff)).toBe(true)
    expect(countChanges(diff)).toEqual({ added: 0, removed: 0, changed: 0 })
  })

  it('should not depend on insertion order', () => {
    const entries: Array<[string, InventoryItem]> = [
      ['a', item('1', '1')],
      ['b', item('2', '2')],
      ['c', item('3', '3')],
    ]
    const previous: Snapshot = new Map([
      ['b', item('2', '1')],
      ['z', item('9', '1')],
    ])

    const forward = diffSnapshots(new Map(entries), previous)
    const reversed = diffSnapshots(new Map([...entries].reverse()), new Map([...previous].reverse()))

    expect(Object.fromEntries(reversed.added)).toEqual(Object.fromEntries(forward.added))
    expect(Object.fromEntries(reversed.removed)).toEqual(Object.fromEntries(forward.removed))
    expect(Object.fromEntries(reversed.changed)).toEqual(Object.fromEntries(forward.changed))
  })

  it('should ignore fields other than amount', () => {
    const previous: Snapshot = new Map([['a', item('1', '1', '0')]])
    const current: Snapshot = new Map([['a', item('1', '1', '5')]])

    expect(isEmptyDiff(diffSnapshots(current, previous))).toBe(true)
  })

  it('should count each category', () => {
    const previous: Snapshot = new Map([
      ['a', item('1', '1')],
      ['b', item('2', '1')],
    ])
    const current: Snapshot = new Map([
      ['b', item('2', '3')],
      ['c', item('3', '1')],
      ['d', item('4', '1')],
    ])

    expect(countChanges(diffSnapshots(current, previous))).toEqual({ added: 2, removed: 1, changed: 1 })
  })
})
