import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { router, publicProcedure } from "../trpc.js";
import { requireCharacters } from "./guards.js";

export const characterRouter = router({
  getAll: publicProcedure.query(async ({ ctx }) => {
    return ctx.roster.getAllCharacters();
  }),

  getById: publicProcedure
    .input(z.object({ id: z.string() }))
    .query(async ({ ctx, input }) => {
      const character = await ctx.roster.getCharacter(input.id);
      if (!character) throw new TRPCError({ code: "NOT_FOUND", message: `no character '${input.id}'` });
      return character;
    }),

  getUnits: publicProcedure.query(async ({ ctx }) => {
    return ctx.roster.getAllUnits();
  }),

  getUnitMembers: publicProcedure
    .input(z.object({ unitId: z.string() }))
    .query(async ({ ctx, input }) => {
      return ctx.roster.getUnitMembers(input.unitId);
    }),

  getRelationships: publicProcedure
    .input(z.object({ characterId: z.string() }))
    .query(async ({ ctx, input }) => {
      await requireCharacters(ctx, [input.characterId]);
      return ctx.simulation.getRelationshipsOf(input.characterId);
    }),
});
