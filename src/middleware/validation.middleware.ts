import { Request, Response, NextFunction } from "express";
import { ZodError, ZodSchema } from "zod";

const toDetails = (error: ZodError) =>
  error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));

export const validate = (schema: ZodSchema) => {
  return async (
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    try {
      req.body = await schema.parseAsync(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          error: "Validation failed",
          code: "VALIDATION_FAILED",
          details: toDetails(error),
        });
        return;
      }
      next(error);
    }
  };
};

/**
 * Validates route params and writes the normalized values back
 */
export const validateParams = (schema: ZodSchema) => {
  return async (
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    const result = await schema.safeParseAsync(req.params);

    if (!result.success) {
      res.status(400).json({
        error: "Path validation failed",
        code: "VALIDATION_FAILED",
        details: toDetails(result.error),
      });
      return;
    }

    Object.assign(req.params, result.data);
    next();
  };
};
