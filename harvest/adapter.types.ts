
export type CsvValue = string | number | null;
export type CsvRecord = Record<string, CsvValue>;

export type ProfessorRow = {
  id: string;
  firstName: string;
  lastName: string;
  fullName: string;
  department: string;
  numEvals: number;
  overallRating: number;
  materialClear: number;
  studentDifficulties: number;
  courses: string;           // "; "-joined course codes
  tags: string;              // "; "-joined key:count pairs
  courses_count: number;
  tags_count: number;
};

export type NameToIdRow = {
  fullName: string;
  firstName: string;
  lastName: string;
  id: string;
  department: string;
  overallRating: number;
  numEvals: number;
};

export type DepartmentSummaryRow = {
  department: string;
  professor_count: number;
  avg_rating: number;
  total_evals: number;
  professor_ids: string;
};

export type ReviewRow = {
  professor_id: string;
  professor_name: string;
  professor_department: string;
  course_code: string;
  review_id: string;
  grade: string;
  grade_level: string;
  course_type: string;
  overall_rating: number;
  presents_material_clearly: number;
  recognizes_student_difficulties: number;
  rating_text: string;
  post_date: string;
};

export type DatasetMap = Record<string, readonly CsvRecord[]>;

export type CollectErrorKind =
  | "network"
  | "http"
  | "rate_limit"
  | "response"
  | "validation"
  | "unexpected";

export type PublishErrorKind = CollectErrorKind | "write";

export type RunError<K extends string = PublishErrorKind> = {
  kind: K;
  message: string;
};

export type CollectOutcome =
  | { ok: true; datasets: DatasetMap }
  | { ok: false; error: RunError<CollectErrorKind>; partial: DatasetMap };

export type Producer = () => Promise<CollectOutcome>;

export type Logger = Pick<Console, "log" | "warn" | "error">;
