// Contract calls: builders, dispatch, middleware and response decoding.

// Dispatch errors (re-exported for client-side error handling)
export { CallError, CallErrorCode } from "@regcall/tx";

// Configuration
export {
  type TxParameters,
  type CallParameters,
  type ContractOptions,
  DEFAULT_GAS_PRICE,
  DEFAULT_GAS_LIMIT,
  DEFAULT_BYTE_PRICE,
  DEFAULT_MATURITY,
  DEFAULT_TX_PARAMETERS,
  DEFAULT_CALL_PARAMETERS,
  resolveTxParameters,
  resolveCallParameters,
} from "./config.ts";

// Call descriptors and script data
export {
  SCRIPT_DATA_HEADER_SIZE,
  type CallDescriptor,
  type CallDescriptorInput,
  type DecodedScriptData,
  createCallDescriptor,
  encodeScriptData,
  decodeScriptData,
} from "./call_descriptor.ts";
export { contractInputs, buildScriptTransaction } from "./transaction.ts";

// Builders and contract handles
export { ContractCallBuilder, type BuilderState } from "./call_builder.ts";
export { Contract, callContract } from "./contract.ts";

// Transport and dispatch
export type { DispatchMode, NodeTransport, TransactionSigner } from "./transport.ts";
export { Dispatcher, type DispatcherOptions } from "./dispatcher.ts";
export {
  RetryingTransport,
  RetryExhaustedError,
  backoffDelay,
  type BackoffConfig,
  type RetryOptions,
} from "./retry.ts";

// Caller and middleware
export { type Caller, type CallerRequest, MiddlewareCaller } from "./caller.ts";
export {
  Extensions,
  RejectionError,
  type ClientContext,
  type CallRequest,
  type CallOutcome,
  type Rejection,
  type RejectionCode,
  type ClientMiddleware,
} from "./middleware.ts";
export { loggingMiddleware, type LoggingOptions, type LogSink } from "./logging.ts";

// Responses
export {
  type CallResponse,
  extractReturnToken,
  extractResponse,
  decodeLogData,
} from "./extractor.ts";
