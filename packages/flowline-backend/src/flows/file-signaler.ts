import { mkdir, readFile, writeFile } from 'fs/promises'
import path from 'path'
import { NotFoundError, SignalDeliveryError, errorMessage } from '../errors'
import { describeErrors, validateFlowStatus } from '../validation'
import { Signaler } from './signaler'
import { FlowStatus } from './types'

export const DEFAULT_STATUS_DIR = path.join('.flowline', 'status')

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

/**
 * Durable channel: one pretty-printed JSON file per flow id, fully
 * overwritten on every update. Survives restarts; not coordinated across
 * processes.
 */
export class FileSignaler implements Signaler {
  constructor(readonly baseDir: string = DEFAULT_STATUS_DIR) {}

  fileFor(flowId: number) {
    return path.join(this.baseDir, `${flowId}.json`)
  }

  async notifyStatus(flowId: number, status: FlowStatus): Promise<void> {
    try {
      await mkdir(this.baseDir, { recursive: true })
      await writeFile(this.fileFor(flowId), JSON.stringify(status, null, 2))
    } catch (err) {
      throw new SignalDeliveryError(`failed to write status file: ${errorMessage(err)}`, { cause: err })
    }
  }

  async getStatus(flowId: number): Promise<FlowStatus> {
    let raw: string
    try {
      raw = await readFile(this.fileFor(flowId), 'utf8')
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') throw new NotFoundError(`status not found for flow ${flowId}`)
      throw new SignalDeliveryError(`failed to read status file: ${errorMessage(err)}`, { cause: err })
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      throw new SignalDeliveryError(`failed to unmarshal status: ${errorMessage(err)}`, { cause: err })
    }
    if (!validateFlowStatus(parsed)) {
      throw new SignalDeliveryError(
        `status file for flow ${flowId} is malformed: ${describeErrors(validateFlowStatus.errors, 'status')}`,
      )
    }
    return parsed
  }
}
