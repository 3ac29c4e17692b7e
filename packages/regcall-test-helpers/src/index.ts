// In-process node stand-in for contract call tests.

export {
  MemoryNode,
  ExecutionContext,
  GasCost,
  NodeRevert,
  type MemoryNodeOptions,
  type MethodHandler,
  type ContractMethod,
  type ContractDefinition,
} from "./memory_node.ts";
export {
  COUNTER_METHODS,
  WALLET_METHODS,
  PROXY_METHODS,
  ECHO_METHODS,
  RELAY_METHODS,
  BAR_METHODS,
  CounterEvent,
  Shaker,
  Cocktail,
} from "./fixtures.ts";
