import {
  AgentDispatchClient,
  EgressClient,
  EgressStatus,
  EncodedFileOutput,
  EncodedFileType,
  RoomServiceClient,
  SipClient,
  TwirpError,
  type EgressInfo,
} from 'livekit-server-sdk';
import { log } from '../log';
import {
  DialError,
  type AgentDispatcher,
  type CallPlatform,
  type DialRequest,
  type EgressService,
  type EgressSnapshot,
  type EgressState,
  type RoomService,
  type SipService,
} from './types';

export interface LiveKitCredentials {
  url: string;
  apiKey?: string;
  apiSecret?: string;
}

const PARTICIPANT_POLL_MS = 250;
const ROOM_EMPTY_TIMEOUT_SECONDS = 300;
const NANOS_PER_SECOND = 1_000_000_000;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class LiveKitRoomService implements RoomService {
  private readonly client: RoomServiceClient;

  constructor(credentials: LiveKitCredentials) {
    this.client = new RoomServiceClient(credentials.url, credentials.apiKey, credentials.apiSecret);
  }

  public async createRoom(roomName: string): Promise<void> {
    await this.client.createRoom({ name: roomName, emptyTimeout: ROOM_EMPTY_TIMEOUT_SECONDS });
    log.info({ event: 'room_created', room: roomName }, 'room created');
  }

  public async deleteRoom(roomName: string): Promise<void> {
    await this.client.deleteRoom(roomName);
    log.info({ event: 'room_deleted', room: roomName }, 'room deleted');
  }

  public async waitForParticipant(roomName: string, identity: string, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      const participants = await this.client.listParticipants(roomName);
      if (participants.some((participant) => participant.identity === identity)) {
        return;
      }
      await delay(PARTICIPANT_POLL_MS);
    }
    throw new Error(`participant ${identity} did not join ${roomName} within ${timeoutMs}ms`);
  }
}

export class LiveKitSipService implements SipService {
  private readonly client: SipClient;

  constructor(
    credentials: LiveKitCredentials,
    private readonly outboundTrunkId: string,
  ) {
    this.client = new SipClient(credentials.url, credentials.apiKey, credentials.apiSecret);
  }

  public async createSipParticipant(request: DialRequest): Promise<void> {
    try {
      await this.client.createSipParticipant(this.outboundTrunkId, request.phoneNumber, request.roomName, {
        participantIdentity: request.participantIdentity,
        waitUntilAnswered: true,
      });
    } catch (error) {
      if (error instanceof TwirpError) {
        throw new DialError(error.message, {
          sipStatusCode: error.metadata?.sip_status_code,
          sipStatus: error.metadata?.sip_status,
        });
      }
      throw error;
    }
  }

  public async transferSipParticipant(roomName: string, participantIdentity: string, transferTo: string): Promise<void> {
    await this.client.transferSipParticipant(roomName, participantIdentity, transferTo);
  }
}

function egressState(status: EgressStatus): EgressState {
  switch (status) {
    case EgressStatus.EGRESS_COMPLETE:
      return 'complete';
    case EgressStatus.EGRESS_FAILED:
    case EgressStatus.EGRESS_ABORTED:
    case EgressStatus.EGRESS_LIMIT_REACHED:
      return 'failed';
    default:
      return 'active';
  }
}

export function toEgressSnapshot(info: EgressInfo): EgressSnapshot {
  const file = info.fileResults[0];
  return {
    egressId: info.egressId,
    state: egressState(info.status),
    filename: file?.filename || undefined,
    sizeBytes: file ? Number(file.size) : undefined,
    durationSeconds: file ? Number(file.duration) / NANOS_PER_SECOND : undefined,
    error: info.error || undefined,
  };
}

/** Only an exact id match counts; anything else reads as a missing job. */
export function selectEgress<T extends { egressId: string }>(items: T[], egressId: string): T | null {
  return items.find((item) => item.egressId === egressId) ?? null;
}

export class LiveKitEgressService implements EgressService {
  private readonly client: EgressClient;

  constructor(credentials: LiveKitCredentials) {
    this.client = new EgressClient(credentials.url, credentials.apiKey, credentials.apiSecret);
  }

  public async startRoomAudioRecording(roomName: string, filepath: string): Promise<string> {
    const output = new EncodedFileOutput({ fileType: EncodedFileType.MP4, filepath });
    const info = await this.client.startRoomCompositeEgress(roomName, output, { audioOnly: true });
    if (!info.egressId) {
      throw new Error('egress start returned no egress id');
    }
    return info.egressId;
  }

  public async stopRecording(egressId: string): Promise<void> {
    await this.client.stopEgress(egressId);
  }

  public async getRecording(egressId: string): Promise<EgressSnapshot | null> {
    const items = await this.client.listEgress({ egressId });
    const info = selectEgress(items, egressId);
    return info ? toEgressSnapshot(info) : null;
  }
}

export class LiveKitAgentDispatcher implements AgentDispatcher {
  private readonly client: AgentDispatchClient;

  constructor(
    credentials: LiveKitCredentials,
    private readonly agentName: string,
  ) {
    this.client = new AgentDispatchClient(credentials.url, credentials.apiKey, credentials.apiSecret);
  }

  public async dispatch(roomName: string, metadata: Record<string, unknown>): Promise<void> {
    const dispatch = await this.client.createDispatch(roomName, this.agentName, {
      metadata: JSON.stringify(metadata),
    });
    log.info(
      { event: 'agent_dispatched', room: roomName, agent_name: this.agentName, dispatch_id: dispatch.id },
      'agent dispatched',
    );
  }
}

export function createLiveKitPlatform(credentials: LiveKitCredentials, outboundTrunkId: string): CallPlatform {
  return {
    rooms: new LiveKitRoomService(credentials),
    sip: new LiveKitSipService(credentials, outboundTrunkId),
    egress: new LiveKitEgressService(credentials),
  };
}
