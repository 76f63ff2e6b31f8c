import test from 'ava'
import {redundancyFor, resolveTopology, type RedundancyClass, type SelectionMode} from '../topology.js'
import {InvalidManualSelectionError, NoDisksFoundError} from '../../errors.js'
import {disk} from '../../__tests__/helpers.js'

function disks(count: number) {
  return Array.from({length: count}, (_, index) => disk(`sd${String.fromCodePoint(97 + index)}`, 500))
}

// -- class table -------------------------------------------------------------

const expectedClasses: Array<[number, RedundancyClass]> = [
  [1, 'single'],
  [2, 'mirror'],
  [3, 'parity-1'],
  [4, 'striped-mirror'],
  [5, 'parity-1'],
  [6, 'parity-2'],
  [7, 'parity-2'],
  [8, 'parity-2'],
  [9, 'parity-2'],
  [10, 'parity-3'],
  [16, 'parity-3']
]

for (const [count, expected] of expectedClasses) {
  test(`${count} disk(s) use ${expected}`, t => {
    t.is(redundancyFor(count), expected)
    t.is(resolveTopology(disks(count)).redundancy, expected)
  })
}

test('redundancyFor rejects counts below one', t => {
  t.throws(() => redundancyFor(0), {instanceOf: RangeError})
  t.throws(() => redundancyFor(1.5), {instanceOf: RangeError})
})

// -- auto-all ----------------------------------------------------------------

test('auto-all assigns every disk in inventory order', t => {
  const inventory = disks(3)
  const decision = resolveTopology(inventory, {kind: 'auto-all'})
  t.deepEqual(decision.assigned.map(d => d.path), ['/dev/sda', '/dev/sdb', '/dev/sdc'])
  t.deepEqual(decision.excluded, [])
  t.is(decision.mode, 'auto-all')
})

test('empty inventory throws NoDisksFoundError', t => {
  t.throws(() => resolveTopology([]), {instanceOf: NoDisksFoundError})
})

test('decision is frozen', t => {
  const decision = resolveTopology(disks(2))
  t.true(Object.isFrozen(decision))
  t.true(Object.isFrozen(decision.assigned))
})

// -- auto-smallest-pair-for-system -------------------------------------------

test('smallest pair takes the two smallest disks as a mirror', t => {
  const inventory = [disk('nvme0n1', 1000), disk('sda', 4000), disk('sdb', 480), disk('sdc', 480)]
  const decision = resolveTopology(inventory, {kind: 'auto-smallest-pair-for-system'})
  t.is(decision.redundancy, 'mirror')
  t.deepEqual(decision.assigned.map(d => d.name), ['sdb', 'sdc'])
  t.deepEqual(decision.excluded.map(d => d.name), ['nvme0n1', 'sda'])
})

test('smallest pair keeps inventory order on equal sizes', t => {
  const inventory = [disk('sda', 2000), disk('sdb', 2000), disk('sdc', 2000)]
  const decision = resolveTopology(inventory, {kind: 'auto-smallest-pair-for-system'})
  t.deepEqual(decision.assigned.map(d => d.name), ['sda', 'sdb'])
  t.deepEqual(decision.excluded.map(d => d.name), ['sdc'])
})

test('smallest pair with a single disk degrades to single', t => {
  const decision = resolveTopology([disk('sda', 500)], {kind: 'auto-smallest-pair-for-system'})
  t.is(decision.redundancy, 'single')
  t.deepEqual(decision.assigned.map(d => d.name), ['sda'])
  t.deepEqual(decision.excluded, [])
})

// -- manual-subset -----------------------------------------------------------

test('manual subset assigns the selection in the given order', t => {
  const inventory = disks(4)
  const decision = resolveTopology(inventory, {kind: 'manual-subset', indexes: [3, 1]})
  t.is(decision.redundancy, 'mirror')
  t.deepEqual(decision.assigned.map(d => d.name), ['sdc', 'sda'])
  t.deepEqual(decision.excluded.map(d => d.name), ['sdb', 'sdd'])
})

test('manual subset rejects an empty selection', t => {
  const error = t.throws(() => resolveTopology(disks(2), {kind: 'manual-subset', indexes: []}), {instanceOf: InvalidManualSelectionError})
  t.is(error?.message, 'Manual disk selection is empty')
})

test('manual subset rejects out-of-range indexes', t => {
  t.throws(() => resolveTopology(disks(2), {kind: 'manual-subset', indexes: [3]}), {
    instanceOf: InvalidManualSelectionError,
    message: 'Disk index 3 is outside 1-2'
  })
  t.throws(() => resolveTopology(disks(2), {kind: 'manual-subset', indexes: [0]}), {instanceOf: InvalidManualSelectionError})
})

test('manual subset rejects duplicate indexes', t => {
  t.throws(() => resolveTopology(disks(3), {kind: 'manual-subset', indexes: [1, 1]}), {
    instanceOf: InvalidManualSelectionError,
    message: 'Disk index 1 is selected more than once'
  })
})

// -- partition invariant -----------------------------------------------------

test('assigned and excluded partition the inventory in every mode', t => {
  const inventory = [disk('sda', 300), disk('sdb', 100), disk('sdc', 200), disk('sdd', 400), disk('sde', 100)]
  const modes: SelectionMode[] = [
    {kind: 'auto-all'},
    {kind: 'auto-smallest-pair-for-system'},
    {kind: 'manual-subset', indexes: [5, 2, 4]}
  ]

  for (const mode of modes) {
    const decision = resolveTopology(inventory, mode)
    const names = [...decision.assigned, ...decision.excluded].map(d => d.name).sort()
    t.deepEqual(names, ['sda', 'sdb', 'sdc', 'sdd', 'sde'])
    t.is(new Set(decision.assigned).size, decision.assigned.length)
    t.true(decision.assigned.length > 0)
    t.is(decision.redundancy, redundancyFor(decision.assigned.length))
  }
})

// -- scenarios ---------------------------------------------------------------

test('two NVMe drives become a mirror', t => {
  const decision = resolveTopology([disk('nvme0n1', 1000), disk('nvme1n1', 1000)])
  t.is(decision.redundancy, 'mirror')
  t.deepEqual(decision.assigned.map(d => d.path), ['/dev/nvme0n1', '/dev/nvme1n1'])
})

test('five disks use single parity', t => {
  t.is(resolveTopology(disks(5)).redundancy, 'parity-1')
})

test('system pair out of four disks leaves the data disks untouched', t => {
  const inventory = [disk('sda', 8000), disk('sdb', 8000), disk('nvme0n1', 512), disk('nvme1n1', 512)]
  const decision = resolveTopology(inventory, {kind: 'auto-smallest-pair-for-system'})
  t.is(decision.redundancy, 'mirror')
  t.deepEqual(decision.assigned.map(d => d.name), ['nvme0n1', 'nvme1n1'])
  t.deepEqual(decision.excluded.map(d => d.name), ['sda', 'sdb'])
})

test('system pair out of five disks mirrors the two smallest in size order', t => {
  const inventory = [disk('sda', 4000), disk('sdb', 960), disk('sdc', 2000), disk('sdd', 480), disk('sde', 8000)]
  const decision = resolveTopology(inventory, {kind: 'auto-smallest-pair-for-system'})
  t.is(decision.redundancy, 'mirror')
  t.deepEqual(decision.assigned.map(d => d.path), ['/dev/sdd', '/dev/sdb'])
  t.deepEqual(decision.excluded.map(d => d.name), ['sda', 'sdc', 'sde'])
})
