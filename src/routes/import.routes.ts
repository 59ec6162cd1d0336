import { Router } from "express";
import { ImportController } from "../controllers/import.controller";
import { asyncHandler } from "../middleware/error.middleware";
import { validate } from "../middleware/validation.middleware";
import { baselineImportSchema } from "../schemas/request.schemas";
import type { BaselineImportService } from "../services/import/baselineImport.service";

export const createImportRoutes = (importService: BaselineImportService): Router => {
  const router = Router();
  const controller = new ImportController(importService);

  router.post(
    "/baseline",
    validate(baselineImportSchema),
    asyncHandler((req, res) => controller.runBaseline(req, res)),
  );

  return router;
};
