import { z } from "zod";

const str = z.string().nullish().transform(v => v ?? "");
const num = z.number().nullish().transform(v => v ?? 0);

export const ProfessorSchema = z.object({
  id: z.string().min(1),
  firstName: str,
  lastName: str,
  department: z.string().nullish(),   // absent -> "Unknown" in the department summary
  numEvals: num,
  overallRating: num,
  materialClear: num,
  studentDifficulties: num,
  courses: z.array(z.string()).nullish().transform(v => v ?? []),
  tags: z.record(z.union([z.number(), z.string()])).nullish().transform(v => v ?? {}),
});
export type Professor = z.infer<typeof ProfessorSchema>;

export const ProfessorsAllResp = z.object({
  result: z.object({ data: z.array(ProfessorSchema) }),
});

export const ReviewSchema = z.object({
  id: str,
  grade: str,
  gradeLevel: str,
  courseType: str,
  overallRating: num,
  presentsMaterialClearly: num,
  recognizesStudentDifficulties: num,
  rating: str,                 // free-text review body
  postDate: str,
});
export type Review = z.infer<typeof ReviewSchema>;

export const ProfessorDetailSchema = z.object({
  reviews: z.record(z.array(ReviewSchema)).nullish().transform(v => v ?? {}),
});
export type ProfessorDetail = z.infer<typeof ProfessorDetailSchema>;

export const ProfessorGetResp = z.object({
  result: z.object({ data: ProfessorDetailSchema }),
});
