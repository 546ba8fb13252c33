// Shared types for the trace-chain services

export { TimeoutError } from './common';

export { SPAN_KINDS } from './tracing';
export type {
  AttributeValue,
  FinishedSpan,
  PropagationEnvelope,
  SpanAttributes,
  SpanKind,
  SpanStatus,
  TraceContext,
} from './tracing';

export { BrokerTopology, FANOUT_CONSUMER_NAMES } from './messaging';
export type {
  BrokerMessage,
  Delivery,
  Destination,
  MessageBody,
  MessageProperties,
  TopologyDeclaration,
} from './messaging';

export type { ChainNext, ChainResponse, ErrorResponse, GreetResponse } from './chain';
