import { z } from "zod";

// ============================================================================
// Reference catalogs (read-only JSON files)
// ============================================================================

// Deck record as stored in the aircraft catalog file
export const deckRecordSchema = z.object({
  slots: z.number().int().nonnegative().default(0),
  rowLength: z.number().int().positive().default(8),
  noseSlots: z.number().int().nonnegative().default(0),
  tailSlots: z.number().int().nonnegative().default(0),
  slotArms: z.array(z.number()).optional(),
});

export type DeckRecord = z.infer<typeof deckRecordSchema>;

export const aircraftRecordSchema = z.object({
  model: z.string().default(""),
  mtw: z.number().nonnegative().default(0),
  mainDeck: deckRecordSchema.optional(),
  lowerDeck: deckRecordSchema.optional(),
});

export type AircraftRecord = z.infer<typeof aircraftRecordSchema>;

// ULD-type catalog keys match the spreadsheet export the file is built from
export const uldTypeRecordSchema = z.object({
  "Prefix": z.string().default(""),
  "ULD Type": z.string().default(""),
  // Fractional or non-positive widths are normalized when the width is resolved
  "Width (slots)": z.number().default(1),
  "Deck": z.string().default("Any"),
  "Notes": z.string().default(""),
});

export type UldTypeRecord = z.infer<typeof uldTypeRecordSchema>;

// ============================================================================
// Planner input
// ============================================================================

export const deckRestrictionEnum = ["MAIN", "LOWER", "ANY"] as const;

export const uldInputSchema = z.object({
  uld_id: z.string().trim().min(1, "ULD ID must not be empty"),
  weight_kg: z.number().finite().nonnegative(),
  deck: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(deckRestrictionEnum).catch("ANY"))
    .default("ANY"),
  allow_special_slots: z.boolean().default(false),
});

export const placementStrategyEnum = ["FIRST_FIT", "CG_BALANCE"] as const;

// Decks sent over the API are expanded slot by slot on the request path
export const MAX_CUSTOM_DECK_SLOTS = 100;
export const MAX_CUSTOM_ROW_LENGTH = 20;

export const customDeckSchema = z.object({
  slots: z.number().int().nonnegative().max(MAX_CUSTOM_DECK_SLOTS).default(0),
  rowLength: z.number().int().positive().max(MAX_CUSTOM_ROW_LENGTH).default(8),
  noseSlots: z.number().int().nonnegative().max(MAX_CUSTOM_DECK_SLOTS).default(0),
  tailSlots: z.number().int().nonnegative().max(MAX_CUSTOM_DECK_SLOTS).default(0),
  slotArms: z.array(z.number()).max(MAX_CUSTOM_DECK_SLOTS).optional(),
});

export const customAircraftSchema = z.object({
  model: z.string().trim().default("CUSTOM"),
  mtw: z.number().nonnegative().default(0),
  mainDeck: customDeckSchema.default({}),
  lowerDeck: customDeckSchema.default({}),
});

export const loadPlanRequestSchema = z
  .object({
    aircraftModel: z.string().trim().min(1).optional(),
    aircraft: customAircraftSchema.optional(),
    ulds: z.array(uldInputSchema).max(500),
    strategy: z.enum(placementStrategyEnum).optional(),
  })
  .refine((body) => body.aircraftModel !== undefined || body.aircraft !== undefined, {
    message: "Either aircraftModel or aircraft must be provided",
    path: ["aircraftModel"],
  });

export type LoadPlanRequest = z.infer<typeof loadPlanRequestSchema>;
