import { Request, Response } from "express";
import type { BaselineImportBody } from "../schemas/request.schemas";
import type { BaselineImportService } from "../services/import/baselineImport.service";

export class ImportController {
  constructor(private readonly importService: BaselineImportService) {}

  /**
   * POST /api/v1/imports/baseline
   * Imports the bundled dataset when its version is newer (or when forced)
   */
  public async runBaseline(req: Request, res: Response): Promise<void> {
    const { force }: BaselineImportBody = req.body;
    const result = await this.importService.runIfOutdated({ force });

    res.status(result.status === "imported" ? 201 : 200).json({
      success: true,
      data: result,
    });
  }
}
