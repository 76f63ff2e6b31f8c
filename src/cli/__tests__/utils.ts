import test from 'ava'
import {selectionFromFlags} from '../utils.js'
import {InvalidManualSelectionError} from '../../errors.js'

test('no flag leaves the selection to the config', t => {
  t.is(selectionFromFlags({}), undefined)
})

test('--disks selects a manual subset', t => {
  t.deepEqual(selectionFromFlags({disks: '1,2'}), {kind: 'manual-subset', indexes: [1, 2]})
})

test('--system-pair selects the smallest pair', t => {
  t.deepEqual(selectionFromFlags({systemPair: true}), {kind: 'auto-smallest-pair-for-system'})
})

test('flags cannot be combined', t => {
  t.throws(() => selectionFromFlags({disks: '1', systemPair: true}), {
    instanceOf: InvalidManualSelectionError,
    message: '--disks and --system-pair cannot be combined'
  })
})

test('an unreadable or empty disk list is rejected', t => {
  t.throws(() => selectionFromFlags({disks: 'sda'}), {
    instanceOf: InvalidManualSelectionError,
    message: 'Invalid disk list: "sda" (expected 1-based indexes such as 1,2)'
  })
  t.throws(() => selectionFromFlags({disks: ','}), {instanceOf: InvalidManualSelectionError})
})
