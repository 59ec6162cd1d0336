import { Router } from "express";
import { FacilityController } from "../controllers/facility.controller";
import { asyncHandler } from "../middleware/error.middleware";
import { validate, validateParams } from "../middleware/validation.middleware";
import {
  facilityEditSchema,
  facilityParamsSchema,
  locationParamsSchema,
} from "../schemas/request.schemas";
import type { FacilityCatalogService } from "../services/facility/facilityCatalog.service";

export const createFacilityRoutes = (catalog: FacilityCatalogService): Router => {
  const router = Router();
  const controller = new FacilityController(catalog);

  router.get(
    "/:locationCode",
    validateParams(locationParamsSchema),
    asyncHandler((req, res) => controller.getRecords(req, res)),
  );

  router.get(
    "/:locationCode/duplicates",
    validateParams(locationParamsSchema),
    asyncHandler((req, res) => controller.getDuplicates(req, res)),
  );

  router.get(
    "/:locationCode/status",
    validateParams(locationParamsSchema),
    asyncHandler((req, res) => controller.getSyncStatus(req, res)),
  );

  router.post(
    "/:locationCode/sync",
    validateParams(locationParamsSchema),
    asyncHandler((req, res) => controller.requestSync(req, res)),
  );

  router.post(
    "/:locationCode",
    validateParams(locationParamsSchema),
    validate(facilityEditSchema),
    asyncHandler((req, res) => controller.submitEdit(req, res)),
  );

  router.delete(
    "/:locationCode/:facilityId",
    validateParams(facilityParamsSchema),
    asyncHandler((req, res) => controller.deleteFacility(req, res)),
  );

  return router;
};
