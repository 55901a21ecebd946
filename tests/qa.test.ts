import { randomUUID } from "node:crypto";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { qaReport } from "../harvest/qa.polyratings.js";
import { toCSV } from "../harvest/utils/emitter.js";

describe("qaReport", () => {
  let mainDir: string;

  beforeEach(() => {
    mainDir = join(tmpdir(), `harvest-qa-${randomUUID().slice(0, 8)}`);
    mkdirSync(mainDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(mainDir, { recursive: true, force: true });
  });

  it("reports zeros when nothing has been published", () => {
    expect(qaReport(mainDir)).toEqual({
      professorCount: 0,
      duplicateIds: 0,
      departmentCount: 0,
      reviewCount: 0,
      orphanReviews: 0,
      pctProfessorsWithReviews: 0,
      pctReviewsWithText: 0,
    });
  });

  it("counts coverage and orphaned reviews", () => {
    writeFileSync(join(mainDir, "professors_data.csv"), toCSV(["id", "fullName"], [
      { id: "P1", fullName: "Ada Smith" },
      { id: "P2", fullName: "Ben Lee" },
    ]));
    writeFileSync(join(mainDir, "department_summary.csv"), toCSV(["department"], [{ department: "CSC" }]));
    writeFileSync(join(mainDir, "professor_detailed_reviews.csv"), toCSV(["professor_id", "rating_text"], [
      { professor_id: "P1", rating_text: "Great, clear" },
      { professor_id: "P1", rating_text: "" },
      { professor_id: "P9", rating_text: "ok" },
    ]));

    expect(qaReport(mainDir)).toEqual({
      professorCount: 2,
      duplicateIds: 0,
      departmentCount: 1,
      reviewCount: 3,
      orphanReviews: 1,
      pctProfessorsWithReviews: 50,
      pctReviewsWithText: 66.7,
    });
  });
});
