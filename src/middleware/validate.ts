import { Request, Response, NextFunction } from "express";
import { z, ZodSchema } from "zod";

export function validate<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const parsed = schema.safeParse(req.body);
    if (parsed.success) {
      req.body = parsed.data;
      return next();
    }
    return res.status(400).json({ error: "Validation error", details: parsed.error.issues, requestId: req.requestId });
  };
}

export type Validated<S extends ZodSchema> = z.infer<S>;
