import { readFile, writeFile } from 'fs/promises'
import path from 'path'
import { describe, expect, it, vi } from 'vitest'
import { NotFoundError, SignalDeliveryError } from '../src/errors'
import { FileSignaler } from '../src/flows/file-signaler'
import { Hub } from '../src/flows/hub'
import { HubSignaler } from '../src/flows/signaler'
import { FlowStatus } from '../src/flows/types'
import { noopLogger, RecordingSink, tempDir } from './helpers'

const failed: FlowStatus = {
  flowId: 7,
  status: 'FAILED',
  lastNode: 'review',
  updatedAt: '2024-05-01T10:15:30.123Z',
  error: 'node review failed: timeout',
}

describe('FileSignaler', () => {
  it('round-trips every field of a status', async () => {
    const signaler = new FileSignaler(await tempDir())
    await signaler.notifyStatus(7, failed)
    const read = await signaler.getStatus(7)
    expect(read).toEqual(failed)
    expect(read.updatedAt).toBe('2024-05-01T10:15:30.123Z')
  })

  it('writes one pretty-printed file per flow', async () => {
    const dir = await tempDir()
    const signaler = new FileSignaler(path.join(dir, 'nested', 'status'))
    await signaler.notifyStatus(7, failed)
    expect(signaler.fileFor(7)).toBe(path.join(dir, 'nested', 'status', '7.json'))
    expect(await readFile(signaler.fileFor(7), 'utf8')).toBe(JSON.stringify(failed, null, 2))
  })

  it('overwrites the previous status', async () => {
    const signaler = new FileSignaler(await tempDir())
    await signaler.notifyStatus(1, { flowId: 1, status: 'RUNNING', lastNode: 'a', updatedAt: '2024-05-01T10:00:00.000Z' })
    await signaler.notifyStatus(1, { flowId: 1, status: 'COMPLETED', updatedAt: '2024-05-01T10:00:01.000Z' })
    expect(await signaler.getStatus(1)).toEqual({ flowId: 1, status: 'COMPLETED', updatedAt: '2024-05-01T10:00:01.000Z' })
  })

  it('reports an unknown flow as not found', async () => {
    const signaler = new FileSignaler(await tempDir())
    await expect(signaler.getStatus(99)).rejects.toBeInstanceOf(NotFoundError)
  })

  it('rejects a malformed status file', async () => {
    const signaler = new FileSignaler(await tempDir())
    await signaler.notifyStatus(3, { flowId: 3, status: 'RUNNING', updatedAt: '2024-05-01T10:00:00.000Z' })
    await writeFile(signaler.fileFor(3), '{"flowId": "three"}')
    await expect(signaler.getStatus(3)).rejects.toBeInstanceOf(SignalDeliveryError)
    await expect(signaler.getStatus(3)).rejects.toThrow(/^status file for flow 3 is malformed: /)
    await expect(signaler.getStatus(3)).rejects.toThrow('/flowId: must be integer')
    await writeFile(signaler.fileFor(3), JSON.stringify({ flowId: 3, status: 'PAUSED', updatedAt: '2024-05-01T10:00:00.000Z' }))
    await expect(signaler.getStatus(3)).rejects.toThrow('/status: must be equal to one of the allowed values')
    await writeFile(signaler.fileFor(3), JSON.stringify({ flowId: 3, status: 'RUNNING', updatedAt: 'yesterday' }))
    await expect(signaler.getStatus(3)).rejects.toThrow('/updatedAt: must match format "date-time"')
    await writeFile(signaler.fileFor(3), '{not json')
    await expect(signaler.getStatus(3)).rejects.toThrow(/^failed to unmarshal status: /)
  })

  it('wraps write failures', async () => {
    const dir = await tempDir()
    const blocker = path.join(dir, 'blocker')
    await writeFile(blocker, 'a file, not a directory')
    const signaler = new FileSignaler(path.join(blocker, 'status'))
    await expect(
      signaler.notifyStatus(1, { flowId: 1, status: 'RUNNING', updatedAt: '2024-05-01T10:00:00.000Z' }),
    ).rejects.toBeInstanceOf(SignalDeliveryError)
  })
})

describe('HubSignaler', () => {
  it('keeps the latest status and pushes a FLOW_STATUS frame', async () => {
    const hub = new Hub({ logger: noopLogger })
    const sink = new RecordingSink()
    hub.attach(sink)
    const signaler = new HubSignaler(hub, noopLogger)

    await signaler.notifyStatus(7, failed)

    expect(await signaler.getStatus(7)).toEqual(failed)
    expect(sink.find('FLOW_STATUS')?.payload).toMatchObject({
      flowId: 7,
      status: 'FAILED',
      lastNode: 'review',
      updatedAt: '2024-05-01T10:15:30.123Z',
      error: 'node review failed: timeout',
    })
  })

  it('stores copies', async () => {
    const signaler = new HubSignaler(new Hub(), noopLogger)
    const status: FlowStatus = { flowId: 1, status: 'RUNNING', updatedAt: '2024-05-01T10:00:00.000Z' }
    await signaler.notifyStatus(1, status)
    status.status = 'FAILED'
    const read = await signaler.getStatus(1)
    read.lastNode = 'changed'
    expect(await signaler.getStatus(1)).toEqual({ flowId: 1, status: 'RUNNING', updatedAt: '2024-05-01T10:00:00.000Z' })
  })

  it('reports an unknown flow as not found', async () => {
    const signaler = new HubSignaler(new Hub(), noopLogger)
    await expect(signaler.getStatus(5)).rejects.toThrow('status not found for flow 5')
  })

  it('logs a failed push without rejecting', async () => {
    const logger = { ...noopLogger, warn: vi.fn() }
    const signaler = new HubSignaler(
      {
        broadcast() {
          throw new Error('hub closed')
        },
      },
      logger,
    )
    await expect(signaler.notifyStatus(2, { flowId: 2, status: 'RUNNING', updatedAt: '2024-05-01T10:00:00.000Z' })).resolves.toBeUndefined()
    expect(logger.warn).toHaveBeenCalledWith('[signal] live push failed', { flowId: 2, error: 'hub closed' })
    expect((await signaler.getStatus(2)).status).toBe('RUNNING')
  })
})
