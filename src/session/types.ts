import type {
  EndorseCertRequest,
  EndorseCertResponse,
  Frame,
} from "../common/types.js";

/**
 * Moves frames to and from the device console. Timeouts and retries belong
 * to the implementation.
 */
export interface FrameTransport {
  sendFrame(frame: Frame): Promise<void>;
  receiveFrame(): Promise<Frame>;
}

export interface EndorsementService {
  /**
   * Sign the TBS certificates a device produced. `signature` is the device's
   * HMAC over the concatenated TBS bytes, checked by the service before it
   * endorses anything.
   */
  endorseCerts(
    signature: Uint8Array,
    requests: readonly EndorseCertRequest[],
  ): Promise<EndorseCertResponse[]>;
}

export interface KeyDerivationService {
  deriveKey(
    seedLabel: string,
    diversifier: Uint8Array,
    size: number,
  ): Promise<Uint8Array>;
}
