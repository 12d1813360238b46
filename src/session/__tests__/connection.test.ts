/**
 * Tests for the Connection state machine
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { Connection } from '../connection'
import { content, ContentTypes } from '../../content'
import {
  ConnectionClosedError,
  IndeterminateTransactionError,
  NetworkError,
  StardogError,
  TransactionError,
  TransactionStateError,
  UsageError,
} from '../../client/errors'

const TRIPLE = '<urn:s> <urn:p> <urn:o> .'

function ok(body: string = ''): Response {
  return new Response(body, { status: 200 })
}

function failure(status: number, code: string, message: string): Response {
  return new Response(JSON.stringify({ message, code }), { status })
}

describe('Connection', () => {
  let mockFetch: ReturnType<typeof vi.fn>
  let logger: ReturnType<typeof vi.fn>
  let conn: Connection

  beforeEach(() => {
    mockFetch = vi.fn()
    logger = vi.fn()
    conn = new Connection({
      database: 'testdb',
      endpoint: 'http://localhost:5820',
      fetch: mockFetch,
      logging: { level: 'debug', logger },
    })
  })

  function calledUrls(): string[] {
    return mockFetch.mock.calls.map(([url]) => String(url))
  }

  describe('construction', () => {
    it('should require a database name', () => {
      expect(() => new Connection({ database: '' })).toThrow(UsageError)
    })

    it('should encode the database name into paths', () => {
      expect(new Connection({ database: 'my db', fetch: mockFetch }).databasePath).toBe('/my%20db')
    })

    it('should check liveness when opened', async () => {
      mockFetch.mockImplementation(async () => ok())

      const opened = await Connection.open({ database: 'testdb', fetch: mockFetch })

      expect(opened.state).toBe('inactive')
      expect(calledUrls()).toEqual(['http://localhost:5820/admin/alive'])
    })

    it('should send basic admin credentials by default', async () => {
      mockFetch.mockImplementation(async () => ok())

      await Connection.open({ database: 'testdb', fetch: mockFetch })

      expect(mockFetch.mock.calls[0][1].headers.Authorization).toBe(`Basic ${btoa('admin:admin')}`)
    })

    it('should fail to open when the server is down', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'))

      await expect(Connection.open({ database: 'testdb', fetch: mockFetch })).rejects.toThrow(
        'Failed to fetch http://localhost:5820/admin/alive'
      )
    })
  })

  describe('begin()', () => {
    it('should store the trimmed transaction id', async () => {
      mockFetch.mockResolvedValue(ok('tx-1\n'))

      await expect(conn.begin()).resolves.toBe('tx-1')

      expect(conn.state).toBe('active')
      expect(conn.transactionId).toBe('tx-1')
      expect(calledUrls()).toEqual(['http://localhost:5820/testdb/transaction/begin'])
      expect(logger).toHaveBeenCalledWith('debug', 'Began transaction tx-1 on testdb')
    })

    it('should refuse to begin while a transaction is active', async () => {
      mockFetch.mockResolvedValue(ok('tx-1'))
      await conn.begin()

      await expect(conn.begin()).rejects.toThrow(TransactionError)
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('should reject an empty transaction id', async () => {
      mockFetch.mockResolvedValue(ok('  '))

      await expect(conn.begin()).rejects.toThrow('Server returned an empty transaction id')
      expect(conn.state).toBe('inactive')
    })

    it('should refuse a concurrent state transition', async () => {
      let resolveBegin: (response: Response) => void = () => {}
      mockFetch.mockReturnValue(
        new Promise<Response>((resolve) => {
          resolveBegin = resolve
        })
      )

      const first = conn.begin()
      await expect(conn.begin()).rejects.toThrow('Cannot begin while begin is in progress')

      resolveBegin(ok('tx-1'))
      await expect(first).resolves.toBe('tx-1')
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })
  })

  describe('commit()', () => {
    it('should go back to inactive on success', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(ok())
      await conn.begin()

      await conn.commit()

      expect(conn.state).toBe('inactive')
      expect(conn.transactionId).toBeUndefined()
      expect(calledUrls()[1]).toBe('http://localhost:5820/testdb/transaction/commit/tx-1')
    })

    it('should require an active transaction', async () => {
      const error = await conn.commit().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TransactionStateError)
      expect(error).toMatchObject({ currentState: 'inactive', expectedState: 'active' })
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should become indeterminate when the server fails', async () => {
      mockFetch
        .mockResolvedValueOnce(ok('tx-1'))
        .mockResolvedValueOnce(failure(500, 'TX500', 'Commit failed'))
        .mockResolvedValueOnce(ok('tx-2'))
      await conn.begin()

      const error = await conn.commit().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(IndeterminateTransactionError)
      expect(error).toMatchObject({ transactionId: 'tx-1', statusCode: 500 })
      expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(StardogError)
      expect(conn.state).toBe('indeterminate')
      expect(conn.transactionId).toBe('tx-1')
      expect(conn.activeTransactionId).toBeUndefined()
      expect(logger).toHaveBeenCalledWith(
        'error',
        'Commit of transaction tx-1 failed, outcome unknown: Commit failed'
      )

      await expect(conn.begin()).resolves.toBe('tx-2')
      expect(conn.state).toBe('active')
    })

    it('should become indeterminate when the transport fails', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockRejectedValueOnce(new TypeError('fetch failed'))
      await conn.begin()

      await expect(conn.commit()).rejects.toThrow(IndeterminateTransactionError)
      expect(conn.state).toBe('indeterminate')
    })

    it('should not allow mutations while indeterminate', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(failure(503, 'HTTP_503', 'Unavailable'))
      await conn.begin()
      await conn.commit().catch(() => undefined)

      await expect(conn.add(content.raw(TRIPLE, ContentTypes.TURTLE))).rejects.toThrow(
        'Cannot add: session is indeterminate, expected active'
      )
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })
  })

  describe('rollback()', () => {
    it('should clear the transaction', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(ok())
      await conn.begin()

      await conn.rollback()

      expect(conn.state).toBe('inactive')
      expect(calledUrls()[1]).toBe('http://localhost:5820/testdb/transaction/rollback/tx-1')
    })

    it('should clear the transaction even when the server fails', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(failure(404, 'TX0', 'Unknown transaction'))
      await conn.begin()

      await expect(conn.rollback()).rejects.toThrow('Unknown transaction')
      expect(conn.state).toBe('inactive')
      expect(conn.transactionId).toBeUndefined()
    })

    it('should require an active transaction', async () => {
      await expect(conn.rollback()).rejects.toThrow(TransactionStateError)
    })
  })

  describe('mutations', () => {
    it('should make no request without a transaction', async () => {
      await expect(conn.add(content.raw(TRIPLE, ContentTypes.TURTLE))).rejects.toThrow(TransactionStateError)
      await expect(conn.remove(content.raw(TRIPLE, ContentTypes.TURTLE))).rejects.toThrow(TransactionStateError)
      await expect(conn.clear()).rejects.toThrow(TransactionStateError)

      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should post content into the transaction', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(ok())
      await conn.begin()

      await conn.add(content.raw(TRIPLE, ContentTypes.NTRIPLES, { graphUri: 'urn:g' }))

      const [url, init] = mockFetch.mock.calls[1]
      expect(url).toBe('http://localhost:5820/testdb/tx-1/add?graph-uri=urn%3Ag')
      expect(init.method).toBe('POST')
      expect(init.body).toBe(TRIPLE)
      expect(init.headers['Content-Type']).toBe('application/n-triples')
    })

    it('should send the content encoding', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(ok())
      await conn.begin()

      await conn.remove(content.raw(TRIPLE, ContentTypes.TURTLE, { contentEncoding: 'gzip' }))

      const [url, init] = mockFetch.mock.calls[1]
      expect(url).toBe('http://localhost:5820/testdb/tx-1/remove')
      expect(init.headers['Content-Encoding']).toBe('gzip')
    })

    it('should clear one graph or all of them', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockImplementation(async () => ok())
      await conn.begin()

      await conn.clear()
      await conn.clear('urn:g')

      expect(calledUrls().slice(1)).toEqual([
        'http://localhost:5820/testdb/tx-1/clear',
        'http://localhost:5820/testdb/tx-1/clear?graph-uri=urn%3Ag',
      ])
    })
  })

  describe('mutations in flight', () => {
    let finishAdd: (response: Response) => void

    beforeEach(async () => {
      finishAdd = () => undefined
      mockFetch
        .mockResolvedValueOnce(ok('tx-1'))
        .mockReturnValueOnce(
          new Promise<Response>((resolve) => {
            finishAdd = resolve
          })
        )
        .mockImplementation(async () => ok())
      await conn.begin()
    })

    it('should refuse to end the transaction until the mutation settles', async () => {
      const adding = conn.add(content.raw(TRIPLE, ContentTypes.TURTLE))

      await expect(conn.commit()).rejects.toThrow('Cannot commit while a mutation is in progress')
      await expect(conn.rollback()).rejects.toThrow('Cannot rollback while a mutation is in progress')
      await expect(conn.close()).rejects.toThrow('Cannot close while a mutation is in progress')
      expect(conn.state).toBe('active')

      finishAdd(ok())
      await adding
      await conn.commit()

      expect(conn.state).toBe('inactive')
      expect(calledUrls()).toEqual([
        'http://localhost:5820/testdb/transaction/begin',
        'http://localhost:5820/testdb/tx-1/add',
        'http://localhost:5820/testdb/transaction/commit/tx-1',
      ])
    })

    it('should allow commit after a failed mutation', async () => {
      const adding = conn.add(content.raw(TRIPLE, ContentTypes.TURTLE))
      finishAdd(failure(400, 'QE0PE2', 'Bad turtle'))

      await expect(adding).rejects.toThrow(StardogError)
      await expect(conn.commit()).resolves.toBeUndefined()
    })
  })

  describe('queries', () => {
    it('should route queries into the active transaction', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(ok('true'))
      await conn.begin()

      await expect(conn.ask('ask { ?s ?p ?o }')).resolves.toBe(true)

      expect(calledUrls()[1]).toBe('http://localhost:5820/testdb/tx-1/query')
    })

    it('should allow updates outside a transaction', async () => {
      mockFetch.mockImplementation(async () => ok())

      await conn.update('insert data { <urn:s> <urn:p> <urn:o> }')

      expect(calledUrls()).toEqual(['http://localhost:5820/testdb/update'])
    })

    it('should keep explain outside the transaction', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(ok('Scan'))
      await conn.begin()

      await expect(conn.explain('select * {}')).resolves.toBe('Scan')

      expect(calledUrls()[1]).toBe('http://localhost:5820/testdb/explain')
    })
  })

  describe('size()', () => {
    it('should parse the count', async () => {
      mockFetch.mockResolvedValue(ok('12'))

      await expect(conn.size({ exact: true })).resolves.toBe(12)
      expect(calledUrls()).toEqual(['http://localhost:5820/testdb/size?exact=true'])
    })
  })

  describe('transaction()', () => {
    it('should commit when the work resolves', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockImplementation(async () => ok())

      const result = await conn.transaction(async (c) => {
        await c.add(content.raw(TRIPLE, ContentTypes.TURTLE))
        return 'done'
      })

      expect(result).toBe('done')
      expect(calledUrls()).toEqual([
        'http://localhost:5820/testdb/transaction/begin',
        'http://localhost:5820/testdb/tx-1/add',
        'http://localhost:5820/testdb/transaction/commit/tx-1',
      ])
    })

    it('should roll back and rethrow when the work throws', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockImplementation(async () => ok())

      await expect(
        conn.transaction(async () => {
          throw new Error('work failed')
        })
      ).rejects.toThrow('work failed')

      expect(conn.state).toBe('inactive')
      expect(calledUrls()[1]).toBe('http://localhost:5820/testdb/transaction/rollback/tx-1')
    })

    it('should keep the work error when the rollback fails too', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(failure(500, 'ERR', 'Rollback failed'))

      await expect(
        conn.transaction(async () => {
          throw new Error('work failed')
        })
      ).rejects.toThrow('work failed')

      expect(logger).toHaveBeenCalledWith('warn', 'Rollback after failed transaction work also failed: Rollback failed')
    })
  })

  describe('close()', () => {
    it('should roll back an open transaction', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockResolvedValueOnce(ok())
      await conn.begin()

      await conn.close()

      expect(conn.state).toBe('closed')
      expect(conn.isOpen).toBe(false)
      expect(calledUrls()[1]).toBe('http://localhost:5820/testdb/transaction/rollback/tx-1')
    })

    it('should log rather than throw when the rollback fails', async () => {
      mockFetch.mockResolvedValueOnce(ok('tx-1')).mockRejectedValueOnce(new TypeError('fetch failed'))
      await conn.begin()

      await expect(conn.close()).resolves.toBeUndefined()

      expect(conn.state).toBe('closed')
      expect(logger).toHaveBeenCalledWith(
        'warn',
        'Rollback of transaction tx-1 on close failed: Failed to fetch http://localhost:5820/testdb/transaction/rollback/tx-1'
      )
    })

    it('should refuse every call afterwards', async () => {
      await conn.close()
      await conn.close()

      await expect(conn.begin()).rejects.toThrow(ConnectionClosedError)
      await expect(conn.select('select * {}')).rejects.toThrow(ConnectionClosedError)
      await expect(conn.size()).rejects.toThrow(ConnectionClosedError)
      expect(() => conn.docs()).toThrow(ConnectionClosedError)
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('streams', () => {
    it('should allow one open stream at a time', async () => {
      mockFetch.mockImplementation(async () => ok('<urn:s> <urn:p> <urn:o> .'))

      const first = await conn.export({ stream: true })
      await expect(conn.export({ stream: true })).rejects.toThrow(
        'Another streamed body is open on this connection; close it first'
      )

      await first.close()
      const second = await conn.export({ stream: true })
      await second.close()

      expect(conn.http.activeStreams).toBe(0)
    })

    it('should validate the chunk size before sending', async () => {
      await expect(conn.export({ stream: true, chunkSize: 0 })).rejects.toThrow(
        'Chunk size must be a positive integer, got 0'
      )
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should close an open stream on close()', async () => {
      mockFetch.mockImplementation(async () => ok('<urn:s> <urn:p> <urn:o> .'))
      const body = await conn.export({ stream: true })

      await conn.close()

      expect(body.closed).toBe(true)
      expect(conn.http.activeStreams).toBe(0)
    })

    it('should release a stream that finishes opening after close()', async () => {
      let respond: (response: Response) => void = () => undefined
      const cancel = vi.fn()
      mockFetch.mockReturnValueOnce(
        new Promise<Response>((resolve) => {
          respond = resolve
        })
      )

      const opening = conn.export({ stream: true })
      expect(mockFetch).toHaveBeenCalledTimes(1)
      await conn.close()
      respond(new Response(new ReadableStream<Uint8Array>({ cancel })))

      await expect(opening).rejects.toThrow(ConnectionClosedError)
      expect(cancel).toHaveBeenCalledTimes(1)
      expect(conn.http.activeStreams).toBe(0)
    })

    it('should free the stream slot when the body breaks off', async () => {
      let pulls = 0
      mockFetch.mockResolvedValueOnce(
        new Response(
          new ReadableStream<Uint8Array>({
            pull(controller) {
              pulls++
              if (pulls === 1) {
                controller.enqueue(new TextEncoder().encode('<urn:s> '))
              } else {
                controller.error(new TypeError('terminated'))
              }
            },
          })
        )
      )
      const body = await conn.export({ stream: true })

      await expect(body.text()).rejects.toThrow(NetworkError)

      expect(body.closed).toBe(true)
      expect(conn.http.activeStreams).toBe(0)
    })

    it('should ask for the requested export format', async () => {
      mockFetch.mockResolvedValue(ok('[]'))

      await expect(conn.export({ contentType: ContentTypes.JSONLD, graphUri: 'urn:g' })).resolves.toBe('[]')

      const [url, init] = mockFetch.mock.calls[0]
      expect(url).toBe('http://localhost:5820/testdb/export?graph-uri=urn%3Ag')
      expect(init.headers.Accept).toBe('application/ld+json')
    })
  })
})
