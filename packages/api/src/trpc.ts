import { initTRPC } from "@trpc/server";
import { MusterError } from "@muster/simulation";
import type { IRosterRepository } from "@muster/roster";
import type { SimulationService } from "./simulation-service.js";

export interface Context {
  roster: IRosterRepository;
  simulation: SimulationService;
}

const t = initTRPC.context<Context>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        musterCode: error.cause instanceof MusterError ? error.cause.code : null,
      },
    };
  },
});

export const router = t.router;
export const publicProcedure = t.procedure;
