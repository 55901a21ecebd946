import { ZodError } from "zod";
import { getJson, HttpError, type HttpOptions } from "../utils/http.js";
import type { DatasetCheck, DatasetSpec } from "../utils/publisher.js";
import { ProfessorGetResp, ProfessorsAllResp, type Professor, type ProfessorDetail } from "./polyratings.types.js";
import type {
  CollectErrorKind, CollectOutcome, DatasetMap, DepartmentSummaryRow, Logger,
  NameToIdRow, ProfessorRow, Producer, ReviewRow, RunError,
} from "../adapter.types.js";

export type PolyRatingsOptions = {
  apiBase: string;
  http?: Partial<HttpOptions>;
  reviewFailureTolerance?: number;   // fraction of detail fetches allowed to fail
  maxProfessors?: number | null;
  log?: Logger;
};

export const POLYRATINGS_DATASETS: DatasetSpec[] = [
  {
    name: "professors",
    mainFile: "professors_data.csv",
    trackingPrefix: "professors_full_data",
    columns: [
      "id", "firstName", "lastName", "fullName", "department", "numEvals", "overallRating",
      "materialClear", "studentDifficulties", "courses", "tags", "courses_count", "tags_count",
    ],
    minRows: 1,
  },
  {
    name: "nameToId",
    mainFile: "professor_name_to_id.csv",
    trackingPrefix: "professor_name_to_id",
    columns: ["fullName", "firstName", "lastName", "id", "department", "overallRating", "numEvals"],
    minRows: 1,
  },
  {
    name: "departments",
    mainFile: "department_summary.csv",
    trackingPrefix: "department_summary",
    columns: ["department", "professor_count", "avg_rating", "total_evals", "professor_ids"],
    minRows: 1,
  },
  {
    name: "reviews",
    mainFile: "professor_detailed_reviews.csv",
    trackingPrefix: "professor_detailed_reviews",
    columns: [
      "professor_id", "professor_name", "professor_department", "course_code", "review_id", "grade",
      "grade_level", "course_type", "overall_rating", "presents_material_clearly",
      "recognizes_student_difficulties", "rating_text", "post_date",
    ],
  },
];

export const uniqueProfessorIds: DatasetCheck = ds => {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const r of ds.professors ?? []) {
    const id = String(r.id);
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return dupes.size ? [`duplicate professor ids: ${[...dupes].join(", ")}`] : [];
};

export const reviewsReferenceProfessors: DatasetCheck = ds => {
  const ids = new Set((ds.professors ?? []).map(r => String(r.id)));
  const orphans = new Set<string>();
  for (const r of ds.reviews ?? []) {
    const id = String(r.professor_id);
    if (!ids.has(id)) orphans.add(id);
  }
  return orphans.size ? [`reviews reference unknown professors: ${[...orphans].join(", ")}`] : [];
};

export const POLYRATINGS_CHECKS: DatasetCheck[] = [uniqueProfessorIds, reviewsReferenceProfessors];

export function fullName(p: Pick<Professor, "firstName" | "lastName">) {
  return `${p.firstName} ${p.lastName}`.trim();
}

export function professorRow(p: Professor): ProfessorRow {
  const tags = Object.entries(p.tags);
  return {
    id: p.id,
    firstName: p.firstName,
    lastName: p.lastName,
    fullName: fullName(p),
    department: p.department ?? "",
    numEvals: p.numEvals,
    overallRating: p.overallRating,
    materialClear: p.materialClear,
    studentDifficulties: p.studentDifficulties,
    courses: p.courses.join("; "),
    tags: tags.map(([k, v]) => `${k}:${v}`).join("; "),
    courses_count: p.courses.length,
    tags_count: tags.length,
  };
}

export function nameToIdRow(p: Professor): NameToIdRow {
  return {
    fullName: fullName(p),
    firstName: p.firstName,
    lastName: p.lastName,
    id: p.id,
    department: p.department ?? "",
    overallRating: p.overallRating,
    numEvals: p.numEvals,
  };
}

/**
 * One row per department in first-seen order. Professors without a department
 * count under "Unknown"; an empty department stays its own group.
 * avg_rating is rounded half up to 2 places.
 */
export function departmentSummary(profs: readonly Professor[]): DepartmentSummaryRow[] {
  const byDept = new Map<string, { count: number; rating: number; evals: number; ids: string[] }>();
  for (const p of profs) {
    const dept = p.department ?? "Unknown";
    const s = byDept.get(dept) ?? { count: 0, rating: 0, evals: 0, ids: [] };
    s.count += 1;
    s.rating += p.overallRating;
    s.evals += p.numEvals;
    s.ids.push(p.id);
    byDept.set(dept, s);
  }
  return [...byDept].map(([department, s]) => ({
    department,
    professor_count: s.count,
    avg_rating: Math.round((s.rating / s.count) * 100) / 100,
    total_evals: s.evals,
    professor_ids: s.ids.join("; "),
  }));
}

export function reviewRows(p: Professor, detail: ProfessorDetail): ReviewRow[] {
  const rows: ReviewRow[] = [];
  for (const [course, reviews] of Object.entries(detail.reviews)) {
    for (const r of reviews) {
      rows.push({
        professor_id: p.id,
        professor_name: fullName(p),
        professor_department: p.department ?? "",
        course_code: course,
        review_id: r.id,
        grade: r.grade,
        grade_level: r.gradeLevel,
        course_type: r.courseType,
        overall_rating: r.overallRating,
        presents_material_clearly: r.presentsMaterialClearly,
        recognizes_student_difficulties: r.recognizesStudentDifficulties,
        rating_text: r.rating,
        post_date: r.postDate,
      });
    }
  }
  return rows;
}

export function toRunError(e: unknown): RunError<CollectErrorKind> {
  if (e instanceof HttpError) return { kind: e.kind, message: e.message };
  if (e instanceof ZodError) {
    const first = e.issues[0];
    const where = first ? ` at ${first.path.join(".") || "(root)"}: ${first.message}` : "";
    return { kind: "response", message: `unexpected response shape${where}` };
  }
  return { kind: "unexpected", message: e instanceof Error ? e.message : String(e) };
}

async function fetchProfessors(opts: PolyRatingsOptions): Promise<Professor[]> {
  const body = await getJson(`${opts.apiBase}/professors.all`, undefined, opts.http);
  return ProfessorsAllResp.parse(body).result.data;
}

async function fetchDetail(opts: PolyRatingsOptions, id: string): Promise<ProfessorDetail> {
  const body = await getJson(`${opts.apiBase}/professors.get`, { input: JSON.stringify({ id }) }, opts.http);
  return ProfessorGetResp.parse(body).result.data;
}

export function collectPolyRatings(opts: PolyRatingsOptions): Producer {
  const log = opts.log ?? console;
  const tolerance = opts.reviewFailureTolerance ?? 0;

  return async (): Promise<CollectOutcome> => {
    let profs: Professor[];
    try {
      profs = await fetchProfessors(opts);
    } catch (e) {
      return { ok: false, error: toRunError(e), partial: {} };
    }
    if (opts.maxProfessors) profs = profs.slice(0, opts.maxProfessors);
    if (!profs.length) {
      return { ok: false, error: { kind: "validation", message: "professors.all returned no professors" }, partial: {} };
    }
    log.log(`Fetched ${profs.length} professors`);

    const base: DatasetMap = {
      professors: profs.map(professorRow),
      nameToId: profs.map(nameToIdRow),
      departments: departmentSummary(profs),
    };

    const reviews: ReviewRow[] = [];
    let failed = 0;
    for (const [i, p] of profs.entries()) {
      log.log(`[${i + 1}/${profs.length}] Fetching reviews for ${fullName(p) || p.id}`);
      try {
        reviews.push(...reviewRows(p, await fetchDetail(opts, p.id)));
      } catch (e) {
        failed += 1;
        const err = toRunError(e);
        log.warn(`WARN reviews for ${p.id} failed: ${err.message}`);
        if (failed / profs.length > tolerance) {
          return {
            ok: false,
            error: { kind: err.kind, message: `review fetch failed for ${p.id}: ${err.message}` },
            partial: base,
          };
        }
      }
    }
    log.log(`Collected ${reviews.length} reviews (${failed} professors skipped)`);

    return { ok: true, datasets: { ...base, reviews } };
  };
}
