import { TRPCError } from "@trpc/server";
import { ConfigurationError } from "@muster/simulation";
import type { Context } from "../trpc.js";

export function requireEvent(ctx: Context, eventId: string): void {
  if (!ctx.simulation.hasEvent(eventId)) {
    throw new TRPCError({ code: "NOT_FOUND", message: `no event '${eventId}'` });
  }
}

export async function requireCharacters(ctx: Context, ids: readonly string[]): Promise<void> {
  for (const id of ids) {
    if (!(await ctx.roster.getCharacter(id))) {
      throw new TRPCError({ code: "NOT_FOUND", message: `no character '${id}'` });
    }
  }
}

export async function requirePair(ctx: Context, a: string, b: string): Promise<void> {
  if (a === b) {
    throw new TRPCError({ code: "BAD_REQUEST", message: `a relationship needs two distinct characters, got '${a}' twice` });
  }
  await requireCharacters(ctx, [a, b]);
}

/** Configuration errors raised by caller-chosen names (axes, subjects) are the caller's fault. */
export function asBadRequest<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new TRPCError({ code: "BAD_REQUEST", message: err.message, cause: err });
    }
    throw err;
  }
}
