import request from "supertest";
import { createTestApp } from "../testApp";
import type { Express } from "express";

describe("Load Plans API Integration Tests", () => {
  let app: Express;

  beforeAll(async () => {
    app = await createTestApp();
  });

  describe("GET /api/aircraft", () => {
    it("should list catalog aircraft sorted by model", async () => {
      const response = await request(app)
        .get("/api/aircraft")
        .expect("Content-Type", /json/)
        .expect(200);

      expect(response.body.aircraft.map((a: { model: string }) => a.model)).toEqual(["TEST-2D", "TEST-4"]);
      expect(response.body.aircraft[0].main_deck).toEqual({ slots: 6, nose_slots: 1, tail_slots: 1 });
      expect(response.body.warnings).toEqual([]);
    });

    it("should pass catalog warnings through", async () => {
      const warned = await createTestApp({ catalogWarnings: ["ULD type record 2 skipped: empty prefix"] });
      const response = await request(warned).get("/api/aircraft").expect(200);

      expect(response.body.warnings).toEqual(["ULD type record 2 skipped: empty prefix"]);
    });
  });

  describe("GET /api/uld-types", () => {
    it("should return the ULD type catalog in order", async () => {
      const response = await request(app).get("/api/uld-types").expect(200);

      expect(response.body.uld_types.map((t: { prefix: string }) => t.prefix)).toEqual(["AKE", "ALF", "PGA"]);
    });
  });

  describe("POST /api/load-plans", () => {
    it("should plan a catalog aircraft", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({
          aircraftModel: "TEST-4",
          ulds: [
            { uld_id: "AKE1", weight_kg: 100, allow_special_slots: true },
            { uld_id: "B", weight_kg: 50, deck: "main" },
          ],
        })
        .expect("Content-Type", /json/)
        .expect(200);

      expect(response.body.strategy).toBe("FIRST_FIT");
      expect(response.body.assignments[0].outcome).toEqual({
        status: "PLACED", deck: "main", start_index: 0, width_slots: 1, slot_indices: [0],
      });
      expect(response.body.assignments[1].uld.deck).toBe("MAIN");
      expect(response.body.assignments[1].outcome.start_index).toBe(1);
      expect(response.body.summary.total_weight).toBe(150);
      expect(response.body.summary.total_moment).toBe(2000);
      expect(response.body.report[3]).toBe("AKE1        main[1]               100");
      expect(response.body.diagram).toHaveLength(19);
    });

    it("should honour a requested strategy", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({
          aircraftModel: "TEST-4",
          strategy: "CG_BALANCE",
          ulds: [{ uld_id: "A", weight_kg: 100, allow_special_slots: true }],
        })
        .expect(200);

      expect(response.body.strategy).toBe("CG_BALANCE");
      expect(response.body.target_arm).toBe(25);
      expect(response.body.assignments[0].outcome.start_index).toBe(1);
    });

    it("should plan a custom aircraft with synthesized arms", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({
          aircraft: { mainDeck: { slots: 2 } },
          ulds: [{ uld_id: "X1", weight_kg: 10 }],
        })
        .expect(200);

      expect(response.body.aircraft.model).toBe("CUSTOM");
      expect(response.body.aircraft.lower_deck.slots).toBe(0);
      expect(response.body.summary.total_moment).toBe(180);
    });

    it("should report unplaced ULDs as warnings", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({
          aircraftModel: "TEST-4",
          ulds: [{ uld_id: "LOW1", weight_kg: 10, deck: "LOWER" }],
        })
        .expect(200);

      expect(response.body.assignments[0].outcome).toEqual({ status: "UNASSIGNED" });
      expect(response.body.warnings).toEqual(["1 ULD(s) could not be placed: LOW1"]);
    });

    it("should return 404 for an unknown model", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({ aircraftModel: "NOPE", ulds: [] })
        .expect(404);

      expect(response.body.error).toBe("Aircraft model NOPE not found");
    });

    it("should reject a negative weight", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({ aircraftModel: "TEST-4", ulds: [{ uld_id: "A", weight_kg: -1 }] })
        .expect(400);

      expect(response.body.error).toBe("Invalid input");
      expect(response.body.details[0].path).toEqual(["ulds", 0, "weight_kg"]);
    });

    it("should reject a custom deck with too many slots", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({ aircraft: { mainDeck: { slots: 1000000000 } }, ulds: [] })
        .expect(400);

      expect(response.body.error).toBe("Invalid input");
      expect(response.body.details[0].path).toEqual(["aircraft", "mainDeck", "slots"]);
    });

    it("should reject oversized special zones and row lengths", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({ aircraft: { lowerDeck: { slots: 4, noseSlots: 500, rowLength: 100000 } }, ulds: [] })
        .expect(400);

      const paths = response.body.details.map((issue: { path: (string | number)[] }) => issue.path.join("."));
      expect(paths).toEqual(["aircraft.lowerDeck.rowLength", "aircraft.lowerDeck.noseSlots"]);
    });

    it("should require an aircraft", async () => {
      const response = await request(app)
        .post("/api/load-plans")
        .send({ ulds: [] })
        .expect(400);

      expect(response.body.details[0].message).toBe("Either aircraftModel or aircraft must be provided");
    });
  });
});
