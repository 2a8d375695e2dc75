import type { Request, Response } from "express";
import type { ZodType } from "zod";

export function parseBody<T>(
  schema: ZodType<T>,
  req: Request,
  res: Response,
): T | null {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    res.status(400).json({
      error: "invalid_request",
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
    return null;
  }
  return result.data;
}

export function parseParam<T>(
  schema: ZodType<T>,
  value: string | undefined,
  field: string,
  res: Response,
): T | null {
  const result = schema.safeParse(value);
  if (!result.success) {
    res.status(400).json({ error: "invalid_request", message: `invalid path parameter: ${field}` });
    return null;
  }
  return result.data;
}

export function sendCsv(res: Response, filename: string, body: string): void {
  res.setHeader("content-type", "text/csv; charset=utf-8");
  res.setHeader("content-disposition", `attachment; filename="${filename}"`);
  res.send(body);
}
