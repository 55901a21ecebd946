import "dotenv/config";
import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { pathToFileURL } from "url";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { loadHarvestConfig } from "./config.js";

const Rows = z.array(z.record(z.string()));
type Row = z.infer<typeof Rows>[number];

export function readCSV(p: string): Row[] {
  if (!existsSync(p)) return [];
  const txt = readFileSync(p, "utf8");
  if (!txt.trim()) return [];
  return Rows.parse(parse(txt, { columns: true, skip_empty_lines: true }));
}

export function qaReport(mainDir: string) {
  const profs = readCSV(join(mainDir, "professors_data.csv"));
  const reviews = readCSV(join(mainDir, "professor_detailed_reviews.csv"));
  const departments = readCSV(join(mainDir, "department_summary.csv"));

  const ids = new Set(profs.map(p => p.id));
  const reviewed = new Set(reviews.map(r => r.professor_id));
  const profsWithReviews = profs.filter(p => reviewed.has(p.id)).length;
  const orphanReviews = reviews.filter(r => !ids.has(r.professor_id)).length;
  const withText = reviews.filter(r => r.rating_text?.trim()).length;

  return {
    professorCount: profs.length,
    duplicateIds: profs.length - ids.size,
    departmentCount: departments.length,
    reviewCount: reviews.length,
    orphanReviews,
    pctProfessorsWithReviews: profs.length ? Number((profsWithReviews / profs.length * 100).toFixed(1)) : 0,
    pctReviewsWithText: reviews.length ? Number((withText / reviews.length * 100).toFixed(1)) : 0,
  };
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  console.log(JSON.stringify(qaReport(loadHarvestConfig().mainDir), null, 2));
}
