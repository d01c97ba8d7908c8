export type GatewayFailureReason = 'timeout' | 'service_error';

export interface RequestContext {
  requestId?: string;
}

export interface Rejected<Reason extends string> {
  outcome: 'rejected';
  reason: Reason;
  message: string;
}

export interface Unavailable {
  outcome: 'unavailable';
  reason: GatewayFailureReason;
  message: string;
}

export function logPrefix(context: RequestContext | undefined, tag: string): string {
  return `[${context?.requestId ?? '-'}] [${tag}]`;
}

export function unavailableCode(reason: GatewayFailureReason): string {
  return reason === 'timeout' ? 'GATEWAY_TIMEOUT' : 'GATEWAY_UNAVAILABLE';
}
