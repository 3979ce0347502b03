import test from 'ava'
import {formatDuration, formatSize} from '../utils.js'

test('formatSize picks the unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(3 * 1024 * 1024), '3.0 MB')
})

test('formatDuration picks the unit', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(2500), '2.5s')
  t.is(formatDuration(125_000), '2m 5s')
})
