import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { RECURRENCES } from "@muster/simulation";
import { router, publicProcedure } from "../trpc.js";
import { isoDate } from "../config.js";
import { asBadRequest, requireCharacters, requireEvent, requirePair } from "./guards.js";

const cycleSettings = z.object({
  environment: z.string().nullable().optional(),
  tone: z.string().nullable().optional(),
  domain: z.string().optional(),
});

const eventInput = z.object({ eventId: z.string() });

const scheduleInput = z.object({
  eventId: z.string(),
  startDate: isoDate,
  recurrence: z.enum(RECURRENCES),
});

export const simulationRouter = router({
  getCurrentDate: publicProcedure.query(({ ctx }) => {
    return { date: ctx.simulation.currentDate };
  }),

  listEvents: publicProcedure.query(async ({ ctx }) => {
    return ctx.simulation.listEvents();
  }),

  checkAvailability: publicProcedure.input(eventInput).query(async ({ ctx, input }) => {
    requireEvent(ctx, input.eventId);
    return ctx.simulation.checkAvailability(input.eventId);
  }),

  selectParticipants: publicProcedure.input(eventInput).query(async ({ ctx, input }) => {
    requireEvent(ctx, input.eventId);
    return ctx.simulation.selectParticipants(input.eventId);
  }),

  getEligibleCandidates: publicProcedure.input(eventInput).query(async ({ ctx, input }) => {
    requireEvent(ctx, input.eventId);
    return ctx.simulation.eligibleCandidates(input.eventId);
  }),

  runEvent: publicProcedure
    .input(eventInput.merge(cycleSettings))
    .mutation(async ({ ctx, input }) => {
      const { eventId, ...settings } = input;
      requireEvent(ctx, eventId);
      return ctx.simulation.runEventCycle(eventId, settings);
    }),

  injectRandomEvent: publicProcedure.input(cycleSettings.default({})).mutation(async ({ ctx, input }) => {
    return ctx.simulation.injectRandomEvent(input);
  }),

  advanceDay: publicProcedure
    .input(z.object({ days: z.number().int().min(1).max(365).default(1) }).default({}))
    .mutation(async ({ ctx, input }) => {
      return ctx.simulation.advanceDay(input.days);
    }),

  getTriggerKinds: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.triggerKinds();
  }),

  submitTrigger: publicProcedure
    .input(
      z.object({
        kind: z.string(),
        subjects: z.array(z.string()).optional(),
        params: z.record(z.unknown()).optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      await requireCharacters(ctx, ctx.simulation.triggerCharacterIds(input));
      return ctx.simulation.submitTrigger(input);
    }),

  getAxisState: publicProcedure
    .input(
      z.object({
        subject: z.union([z.string(), z.tuple([z.string(), z.string()])]),
        axis: z.string(),
      }),
    )
    .query(async ({ ctx, input }) => {
      const { subject, axis } = input;
      if (typeof subject === "string") await requireCharacters(ctx, [subject]);
      else await requirePair(ctx, subject[0], subject[1]);
      return { value: asBadRequest(() => ctx.simulation.getAxisState(subject, axis)) };
    }),

  getRelationship: publicProcedure
    .input(z.object({ a: z.string(), b: z.string() }))
    .query(async ({ ctx, input }) => {
      await requirePair(ctx, input.a, input.b);
      return ctx.simulation.getRelationship(input.a, input.b);
    }),

  listSchedule: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.listSchedule();
  }),

  getScheduledFor: publicProcedure.input(z.object({ date: isoDate })).query(({ ctx, input }) => {
    return ctx.simulation.scheduledFor(input.date);
  }),

  scheduleEvent: publicProcedure.input(scheduleInput).mutation(({ ctx, input }) => {
    requireEvent(ctx, input.eventId);
    return ctx.simulation.scheduleEvent(input);
  }),

  updateSchedule: publicProcedure
    .input(scheduleInput.extend({ id: z.number().int() }))
    .mutation(({ ctx, input }) => {
      const { id, ...entry } = input;
      requireEvent(ctx, entry.eventId);
      const updated = ctx.simulation.updateSchedule(id, entry);
      if (!updated) throw new TRPCError({ code: "NOT_FOUND", message: `no scheduled event ${id}` });
      return updated;
    }),

  removeSchedule: publicProcedure.input(z.object({ id: z.number().int() })).mutation(({ ctx, input }) => {
    if (!ctx.simulation.removeSchedule(input.id)) {
      throw new TRPCError({ code: "NOT_FOUND", message: `no scheduled event ${input.id}` });
    }
    return { id: input.id };
  }),

  getCycleLog: publicProcedure
    .input(
      z
        .object({
          characterId: z.string().optional(),
          eventId: z.string().optional(),
          fromDate: isoDate.optional(),
          toDate: isoDate.optional(),
        })
        .default({}),
    )
    .query(({ ctx, input }) => {
      return ctx.simulation.getCycleLog(input);
    }),

  saveSnapshot: publicProcedure
    .input(z.object({ name: z.string().min(1).max(64) }))
    .mutation(async ({ ctx, input }) => {
      return ctx.simulation.saveSnapshot(input.name);
    }),

  listSnapshots: publicProcedure.query(({ ctx }) => {
    return ctx.simulation.listSnapshots();
  }),

  loadSnapshot: publicProcedure
    .input(z.object({ name: z.string() }))
    .mutation(async ({ ctx, input }) => {
      const restored = await ctx.simulation.loadSnapshot(input.name);
      if (!restored) throw new TRPCError({ code: "NOT_FOUND", message: `no snapshot '${input.name}'` });
      return restored;
    }),
});
