import { NotFoundError, errorMessage } from '../errors'
import { Logger } from '../types'
import { Broadcaster } from './hub'
import { encodeMessage, flowStatusMessage } from './messages'
import { FlowStatus } from './types'

/** Status notification contract shared by the live and the durable channel. */
export interface Signaler {
  notifyStatus(flowId: number, status: FlowStatus): Promise<void>
  getStatus(flowId: number): Promise<FlowStatus>
}

/**
 * Live channel: remembers the latest status per flow in process memory and
 * pushes a FLOW_STATUS frame through the hub. The map is only touched from
 * synchronous code on the event loop, so reads never observe a half-applied
 * write. A failed push is logged, never returned.
 */
export class HubSignaler implements Signaler {
  private readonly statuses = new Map<number, FlowStatus>()

  constructor(private readonly hub: Broadcaster, private readonly logger: Logger = console) {}

  async notifyStatus(flowId: number, status: FlowStatus): Promise<void> {
    this.statuses.set(flowId, { ...status })
    try {
      this.hub.broadcast(encodeMessage(flowStatusMessage(status)))
    } catch (err) {
      this.logger.warn('[signal] live push failed', { flowId, error: errorMessage(err) })
    }
  }

  async getStatus(flowId: number): Promise<FlowStatus> {
    const status = this.statuses.get(flowId)
    if (!status) throw new NotFoundError(`status not found for flow ${flowId}`)
    return { ...status }
  }
}
