import { Router } from "express";
import type { FacilityCatalogService } from "../services/facility/facilityCatalog.service";
import type { BaselineImportService } from "../services/import/baselineImport.service";
import { createFacilityRoutes } from "./facility.routes";
import { createImportRoutes } from "./import.routes";

export interface ApiServices {
  catalog: FacilityCatalogService;
  importService: BaselineImportService;
}

export const createRoutes = ({ catalog, importService }: ApiServices): Router => {
  const router = Router();

  router.use("/facilities", createFacilityRoutes(catalog));

  router.use("/imports", createImportRoutes(importService));

  return router;
};
