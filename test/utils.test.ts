import { describe, test } from 'node:test'
import assert from 'node:assert/strict'
import { generateId, sleep, errorMessage } from '../src/utils.js'

describe('generateId', () => {
  test('returns a 32-char hex string by default', () => {
    const id = generateId()
    assert.equal(id.length, 32)
    assert.match(id, /^[a-f0-9]{32}$/)
  })

  test('honours the byte count', () => {
    assert.match(generateId(6), /^[a-f0-9]{12}$/)
  })

  test('returns unique values', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId(6)))
    assert.equal(ids.size, 100)
  })
})

describe('sleep', () => {
  test('waits at least the given time', async () => {
    const started = Date.now()
    await sleep(20)
    assert.ok(Date.now() - started >= 15)
  })
})

describe('errorMessage', () => {
  test('uses the message of an Error', () => {
    assert.equal(errorMessage(new Error('disk full')), 'disk full')
  })

  test('stringifies anything else', () => {
    assert.equal(errorMessage('plain'), 'plain')
    assert.equal(errorMessage(42), '42')
  })
})
