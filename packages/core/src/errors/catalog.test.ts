import { describe, it, expect } from 'vitest'
import {
  DatastoreError,
  NotFoundError,
  UnsupportedError,
  isNotFoundError,
} from './catalog.js'

describe('DatastoreError', () => {
  it('has correct errorCode, message, and details', () => {
    const err = new DatastoreError('BAD_KEY', 'Bad key', {
      details: { key: '/a' },
    })

    expect(err.errorCode).toBe('BAD_KEY')
    expect(err.message).toBe('Bad key')
    expect(err.details).toEqual({ key: '/a' })
    expect(err.name).toBe('DatastoreError')
    expect(err).toBeInstanceOf(Error)
  })

  it('toJSON() returns serializable object', () => {
    const err = new DatastoreError('BAD_KEY', 'Bad key', {
      details: { key: '/a' },
    })

    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'BAD_KEY',
        message: 'Bad key',
        details: { key: '/a' },
      },
    })

    // Omits details when undefined
    expect(new DatastoreError('BAD_KEY', 'Bad key').toJSON()).toEqual({
      error: { errorCode: 'BAD_KEY', message: 'Bad key' },
    })
  })

  it('keeps the underlying cause', () => {
    const cause = new Error('boom')
    const err = new NotFoundError({ cause })

    expect(err.cause).toBe(cause)
  })
})

describe('NotFoundError', () => {
  it('uses NOT_FOUND and the class name', () => {
    const err = new NotFoundError({ details: { key: '/missing' } })

    expect(err.errorCode).toBe('NOT_FOUND')
    expect(err.message).toBe('datastore: key not found')
    expect(err.name).toBe('NotFoundError')
    expect(err.details).toEqual({ key: '/missing' })
  })
})

describe('UnsupportedError', () => {
  it('names the operation in message and details', () => {
    const err = new UnsupportedError('diskUsage')

    expect(err.errorCode).toBe('UNSUPPORTED')
    expect(err.message).toBe('datastore: diskUsage is not supported')
    expect(err.details).toEqual({ operation: 'diskUsage' })
  })
})

describe('isNotFoundError', () => {
  it('recognises only NotFoundError', () => {
    expect(isNotFoundError(new NotFoundError())).toBe(true)
    expect(isNotFoundError(new UnsupportedError('diskUsage'))).toBe(false)
    expect(isNotFoundError(new Error('datastore: key not found'))).toBe(false)
    expect(isNotFoundError(undefined)).toBe(false)
  })
})
