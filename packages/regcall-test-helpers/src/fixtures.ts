// Sample contracts for exercising the call path end to end.

import {
  enumToken,
  structToken,
  toHex,
  u64Token,
  type EnumSchema,
  type Schema,
  type StructSchema,
  type Token,
} from "@regcall/abi";

import type { ContractMethod, ExecutionContext } from "./memory_node.ts";

const U64: Schema = { kind: "u64" };
const B256: Schema = { kind: "b256" };

function u64Of(token: Token): bigint {
  if (token.kind !== "u64") throw new Error(`expected u64 argument, got ${token.kind}`);
  return token.value;
}

function hexOf(token: Token): string {
  if (token.kind !== "b256") throw new Error(`expected b256 argument, got ${token.kind}`);
  return toHex(token.value);
}

// ============================================================================
// Counter
// ============================================================================

export const CounterEvent: EnumSchema = {
  kind: "enum",
  name: "CounterEvent",
  variants: [
    { name: "Incremented", schema: U64 },
    { name: "Decremented", schema: U64 },
  ],
};

function count(ctx: ExecutionContext): bigint {
  const stored = ctx.read("count");
  return stored === undefined ? 0n : u64Of(stored);
}

/** Stored counter; `decrement` reverts with 1 at zero. */
export const COUNTER_METHODS: ContractMethod[] = [
  {
    name: "get_count",
    inputs: [],
    output: U64,
    handler: (ctx) => u64Token(count(ctx)),
  },
  {
    name: "increment_counter",
    inputs: [{ name: "value", schema: U64 }],
    output: U64,
    handler: (ctx, [value]) => {
      const next = count(ctx) + u64Of(value);
      ctx.write("count", u64Token(next));
      ctx.logData(CounterEvent, enumToken(0, value));
      return u64Token(next);
    },
  },
  {
    name: "decrement",
    inputs: [],
    output: U64,
    handler: (ctx) => {
      const current = count(ctx);
      if (current === 0n) ctx.revert(1n);
      ctx.write("count", u64Token(current - 1n));
      ctx.logData(CounterEvent, enumToken(1, u64Token(1)));
      return u64Token(current - 1n);
    },
  },
];

// ============================================================================
// Wallet
// ============================================================================

/** Pays out of its own balance; each transfer to an address needs a variable output. */
export const WALLET_METHODS: ContractMethod[] = [
  {
    name: "withdraw",
    inputs: [
      { name: "recipient", schema: B256 },
      { name: "amount", schema: U64 },
    ],
    output: { kind: "unit" },
    handler: (ctx, [recipient, amount]) => {
      ctx.log(u64Of(amount));
      ctx.transfer(hexOf(recipient), u64Of(amount));
    },
  },
  {
    name: "split",
    inputs: [
      { name: "first", schema: B256 },
      { name: "second", schema: B256 },
      { name: "amount", schema: U64 },
    ],
    output: { kind: "unit" },
    handler: (ctx, [first, second, amount]) => {
      ctx.transfer(hexOf(first), u64Of(amount));
      ctx.transfer(hexOf(second), u64Of(amount));
    },
  },
  {
    name: "fund",
    inputs: [
      { name: "target", schema: B256 },
      { name: "amount", schema: U64 },
    ],
    output: { kind: "unit" },
    handler: (ctx, [target, amount]) => {
      ctx.transferToContract(hexOf(target), u64Of(amount));
    },
  },
  {
    name: "balance",
    inputs: [],
    output: U64,
    handler: (ctx) => u64Token(ctx.balance()),
  },
];

// ============================================================================
// Proxy
// ============================================================================

/** Forwards to a counter, so the counter is a dependency of every call. */
export const PROXY_METHODS: ContractMethod[] = [
  {
    name: "proxy_increment",
    inputs: [
      { name: "counter", schema: B256 },
      { name: "value", schema: U64 },
    ],
    output: U64,
    handler: (ctx, [counter, value]) => {
      ctx.log(1n);
      return ctx.call(hexOf(counter), "increment_counter", [value]);
    },
  },
];

// ============================================================================
// Echo and relay
// ============================================================================

/** `outer` calls back into `inner` through a relay before returning. */
export const ECHO_METHODS: ContractMethod[] = [
  {
    name: "outer",
    inputs: [{ name: "relay", schema: B256 }],
    output: U64,
    handler: (ctx, [relay]) => {
      ctx.call(hexOf(relay), "bounce");
      return u64Token(99);
    },
  },
  {
    name: "inner",
    inputs: [],
    output: U64,
    handler: () => u64Token(1),
  },
];

export const RELAY_METHODS: ContractMethod[] = [
  {
    name: "bounce",
    inputs: [],
    output: U64,
    handler: (ctx) => ctx.call(ctx.callerId, "inner"),
  },
];

// ============================================================================
// Bar
// ============================================================================

export const Shaker: EnumSchema = {
  kind: "enum",
  name: "Shaker",
  variants: [
    { name: "Cosmopolitan", schema: U64 },
    { name: "Mojito", schema: U64 },
  ],
};

export const Cocktail: StructSchema = {
  kind: "struct",
  name: "Cocktail",
  fields: [
    { name: "the_thing_you_mix_in", schema: Shaker },
    { name: "glass", schema: U64 },
  ],
};

/** Arguments and returns wider than a word. */
export const BAR_METHODS: ContractMethod[] = [
  {
    name: "refill",
    inputs: [
      { name: "cocktail", schema: Cocktail },
      { name: "extra", schema: U64 },
    ],
    output: Cocktail,
    handler: (_ctx, [cocktail, extra]) => {
      if (cocktail.kind !== "struct") throw new Error("expected a struct");
      const [mix, glass] = cocktail.fields;
      return structToken([mix, u64Token(u64Of(glass) + u64Of(extra))]);
    },
  },
  {
    name: "sum",
    inputs: [{ name: "values", schema: { kind: "vector", element: U64 } }],
    output: U64,
    handler: (_ctx, [values]) => {
      if (values.kind !== "vector") throw new Error("expected a vector");
      return u64Token(values.elements.reduce((acc, v) => acc + u64Of(v), 0n));
    },
  },
  {
    name: "echo_byte",
    inputs: [{ name: "value", schema: { kind: "byte" } }],
    output: { kind: "byte" },
    handler: (_ctx, [value]) => value,
  },
  {
    name: "fingerprint",
    inputs: [{ name: "hash", schema: B256 }],
    output: B256,
    handler: (_ctx, [hash]) => hash,
  },
];
