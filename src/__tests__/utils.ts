import test from 'ava'
import {formatDuration, formatSize, parseIndexList} from '../utils.js'

test('formatSize picks the largest fitting unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(480 * 1024 ** 3), '480.0 GB')
  t.is(formatSize(2 * 1024 ** 4), '2.0 TB')
})

test('formatDuration', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(4200), '4.2s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('parseIndexList reads comma-separated indexes', t => {
  t.deepEqual(parseIndexList('1,3'), [1, 3])
  t.deepEqual(parseIndexList(' 2 , 4 ,'), [2, 4])
  t.deepEqual(parseIndexList(''), [])
  t.is(parseIndexList('1,a'), undefined)
  t.is(parseIndexList('-1'), undefined)
})
