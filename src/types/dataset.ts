import { z } from 'zod';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export const HttpMethodSchema = z.enum(HTTP_METHODS);
export type HttpMethod = z.infer<typeof HttpMethodSchema>;

export const UNKNOWN_METHOD = 'UNKNOWN' as const;

export const PredictedMethodSchema = z.union([HttpMethodSchema, z.literal(UNKNOWN_METHOD)]);
export type PredictedMethod = z.infer<typeof PredictedMethodSchema>;

// Ids arrive as CSV text
export const TestCaseIdSchema = z.string().regex(/^\d+$/, 'must be a non-negative integer').transform(Number);

export const ExampleSchema = z.object({
    question: z.string().min(1),
    method: HttpMethodSchema,
    path: z.string().startsWith('/')
});
export type Example = z.infer<typeof ExampleSchema>;

export const TestCaseSchema = z.object({
    id: TestCaseIdSchema,
    question: z.string().min(1)
});
export type TestCase = z.infer<typeof TestCaseSchema>;

export type Prediction = {
    readonly id: number;
    readonly method: PredictedMethod;
    readonly path: string;
    readonly rawResponse: string;
    readonly cost: number;
};

export const SubmissionRowSchema = z.object({
    id: TestCaseIdSchema,
    method: PredictedMethodSchema,
    path: z.string()
});
export type SubmissionRow = z.infer<typeof SubmissionRowSchema>;

export const ReferenceRowSchema = z.object({
    id: TestCaseIdSchema,
    method: HttpMethodSchema,
    path: z.string().startsWith('/')
});
export type ReferenceRow = z.infer<typeof ReferenceRowSchema>;

export function isHttpMethod(value: string): value is HttpMethod {
    return HttpMethodSchema.safeParse(value).success;
}

export function toSubmissionRow(p: Prediction): SubmissionRow {
    return { id: p.id, method: p.method, path: p.path };
}
