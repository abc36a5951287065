import type { Express } from "express";
import { createServer, type Server } from "http";
import { loadPlanRequestSchema, type LoadPlanRequest } from "@shared/schema";
import {
  aircraftFromRecord,
  listAircraftModels,
  planLoad,
  renderAssignmentReport,
  renderLoadPlanDiagram,
  type AircraftCatalog,
  type AircraftConfig,
  type PlannerConfig,
  type UldTypeEntry,
} from "../../packages/utils/src";

export interface PlannerContext {
  aircraftCatalog: AircraftCatalog;
  uldCatalog: UldTypeEntry[];
  config: Pick<PlannerConfig, "strategy" | "armRanges">;
  catalogWarnings: string[];
}

function deckSummary(aircraft: AircraftConfig) {
  return {
    model: aircraft.model,
    mtw: aircraft.mtw,
    main_deck: {
      slots: aircraft.main_deck.slot_count,
      nose_slots: aircraft.main_deck.nose_slots,
      tail_slots: aircraft.main_deck.tail_slots,
    },
    lower_deck: {
      slots: aircraft.lower_deck.slot_count,
      nose_slots: aircraft.lower_deck.nose_slots,
      tail_slots: aircraft.lower_deck.tail_slots,
    },
  };
}

export async function registerRoutes(app: Express, context: PlannerContext): Promise<Server> {
  // ============================================================================
  // REFERENCE CATALOGS
  // ============================================================================

  app.get("/api/aircraft", (_req, res) => {
    const aircraft = listAircraftModels(context.aircraftCatalog)
      .map((model) => context.aircraftCatalog.get(model))
      .filter((entry): entry is AircraftConfig => entry !== undefined)
      .map(deckSummary);

    res.json({ aircraft, warnings: context.catalogWarnings });
  });

  app.get("/api/uld-types", (_req, res) => {
    res.json({ uld_types: context.uldCatalog });
  });

  // ============================================================================
  // LOAD PLANS
  // ============================================================================

  app.post("/api/load-plans", (req, res) => {
    try {
      const parsed = loadPlanRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
      }

      const body: LoadPlanRequest = parsed.data;
      let aircraft: AircraftConfig | undefined;
      if (body.aircraftModel !== undefined) {
        aircraft = context.aircraftCatalog.get(body.aircraftModel);
        if (!aircraft) {
          return res.status(404).json({ error: `Aircraft model ${body.aircraftModel} not found` });
        }
      } else if (body.aircraft) {
        aircraft = aircraftFromRecord({
          ...body.aircraft,
          model: body.aircraft.model === "" ? "CUSTOM" : body.aircraft.model,
        });
      }
      if (!aircraft) {
        return res.status(400).json({ error: "Either aircraftModel or aircraft must be provided" });
      }

      const result = planLoad(aircraft, body.ulds, context.uldCatalog, {
        strategy: body.strategy ?? context.config.strategy,
        armRanges: context.config.armRanges,
      });

      res.json({
        aircraft: deckSummary(result.aircraft),
        strategy: result.strategy,
        assignments: result.assignments,
        summary: result.summary,
        target_arm: result.target_arm,
        warnings: result.warnings,
        report: renderAssignmentReport(result),
        diagram: renderLoadPlanDiagram(result, context.uldCatalog),
      });
    } catch (error) {
      console.error("Load plan error:", error);
      res.status(500).json({ error: "Failed to compute load plan" });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
