import {
  createCustomAircraft,
  listAircraftModels,
  parseDeckRestriction,
  parseSpecialSlotPermission,
  validateSlotCount,
  validateUldId,
  validateWeight,
  type AircraftCatalog,
  type AircraftConfig,
  type UldInput,
} from "../../packages/utils/src";
import type { Prompter } from "./prompter";

export async function promptAircraft(
  prompter: Prompter,
  catalog: AircraftCatalog
): Promise<AircraftConfig> {
  const models = listAircraftModels(catalog);
  if (models.length > 0) {
    prompter.write("Aircraft in DB:\n");
    for (const model of models) {
      prompter.write(` - ${model}\n`);
    }
  }

  const model = (await prompter.ask("Enter aircraft model: ")).trim();
  const known = model !== "" ? catalog.get(model) : undefined;
  if (known) {
    prompter.write(`Using DB entry for ${model}\n`);
    return known;
  }

  prompter.write("Custom aircraft\n");
  const mainSlots = await prompter.askUntilValid("Main deck slots: ", validateSlotCount);
  const lowerSlots = await prompter.askUntilValid("Lower deck slots: ", validateSlotCount);
  return createCustomAircraft(model, mainSlots, lowerSlots);
}

export async function promptUld(prompter: Prompter, position: number): Promise<UldInput> {
  const uldId = await prompter.askUntilValid(`ULD #${position} ID: `, validateUldId);
  const weight = await prompter.askUntilValid(`ULD ${uldId} weight (kg): `, validateWeight);
  const deck = parseDeckRestriction(await prompter.ask("ULD type (MAIN / LOWER / ANY): "));
  const allowSpecial = parseSpecialSlotPermission(await prompter.ask("Allow nose/tail? (y/n): "));

  return {
    uld_id: uldId,
    weight_kg: weight,
    deck,
    allow_special_slots: allowSpecial,
  };
}

export async function promptUlds(prompter: Prompter): Promise<UldInput[]> {
  const count = await prompter.askUntilValid("Number of ULDs: ", validateSlotCount);
  const ulds: UldInput[] = [];
  for (let i = 0; i < count; i++) {
    ulds.push(await promptUld(prompter, i + 1));
  }
  return ulds;
}
