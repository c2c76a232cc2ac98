// src/errors/rpcError.ts
// Base class of the RPC error hierarchy emitted into errors.ts

import type { ErrorKind } from "./types";

/**
 * An error the server answered a call with. Generated subclasses set the
 * static `CODE`/`NAME` (per code) and `ID`/`MESSAGE` (per entry).
 */
export class RPCError extends Error {
  static readonly CODE: number = 0;
  static readonly NAME: string = "RPC_ERROR";
  static readonly ID: string | undefined = undefined;
  static readonly MESSAGE: string = "";

  readonly code: number;
  /** The raw error string the server sent, e.g. `FLOOD_WAIT_30`. */
  readonly rawMessage: string;
  readonly value?: number;
  readonly rpcName?: string;
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, rpcName?: string) {
    super(describe(kind, rpcName));
    this.name = new.target.name;
    this.kind = kind;
    this.code = kind.code;
    this.rawMessage = kind.message;
    this.rpcName = rpcName;
    if (kind.tag === "Specific") {
      this.value = kind.value;
    }
  }
}

export type RPCErrorClass = typeof RPCError;

function describe(kind: ErrorKind, rpcName?: string): string {
  const cause = rpcName ? ` (caused by "${rpcName}")` : "";
  switch (kind.tag) {
    case "Specific":
      return `[${kind.code} ${kind.message}] - ${kind.description}${cause}`;
    case "Generic":
      return `[${kind.code} ${kind.name}] - ${kind.message}${cause}`;
    case "Unknown":
      return `[${kind.code} UNKNOWN] - ${kind.message}${cause}`;
  }
}

/**
 * Instantiate the most specific class for a resolved kind: the entry's class,
 * else the code's class, else `fallback`.
 */
export function instantiateRpcError(
  kind: ErrorKind,
  classes: ReadonlyMap<string, RPCErrorClass>,
  fallback: RPCErrorClass,
  rpcName?: string
): RPCError {
  let cls: RPCErrorClass | undefined;
  if (kind.tag === "Specific") cls = classes.get(`${kind.code}:${kind.id}`);
  if (!cls && kind.tag !== "Unknown") cls = classes.get(String(kind.code));
  return new (cls ?? fallback)(kind, rpcName);
}
