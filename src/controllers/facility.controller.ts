import { Request, Response } from "express";
import type { FacilityEditBody } from "../schemas/request.schemas";
import type { FacilityCatalogService } from "../services/facility/facilityCatalog.service";

export class FacilityController {
  constructor(private readonly catalog: FacilityCatalogService) {}

  /**
   * GET /api/v1/facilities/:locationCode
   * Deduplicated local records for one airport
   */
  public async getRecords(req: Request, res: Response): Promise<void> {
    const { locationCode } = req.params;
    const records = this.catalog.getRecords(locationCode);

    res.status(200).json({
      success: true,
      data: { locationCode, count: records.length, records },
    });
  }

  /**
   * GET /api/v1/facilities/:locationCode/duplicates
   * Stored records sharing a normalized name; losers are candidates for deletion
   */
  public async getDuplicates(req: Request, res: Response): Promise<void> {
    const { locationCode } = req.params;
    const groups = this.catalog.getDuplicateGroups(locationCode);

    res.status(200).json({
      success: true,
      data: { locationCode, count: groups.length, groups },
    });
  }

  /**
   * GET /api/v1/facilities/:locationCode/status
   */
  public async getSyncStatus(req: Request, res: Response): Promise<void> {
    const status = await this.catalog.getSyncStatus(req.params.locationCode);
    res.status(200).json({ success: true, data: status });
  }

  /**
   * POST /api/v1/facilities/:locationCode/sync
   * Pulls remote data; an unreachable backend still answers 200 with local records
   */
  public async requestSync(req: Request, res: Response): Promise<void> {
    const result = await this.catalog.requestSync(req.params.locationCode);

    res.status(200).json({
      success: true,
      data: {
        locationCode: result.locationCode,
        outcome: result.outcome,
        fetched: result.fetched,
        merged: result.report.merged,
        added: result.report.added,
        duplicatesDropped: result.report.duplicatesDropped,
        records: result.records,
      },
    });
  }

  /**
   * POST /api/v1/facilities/:locationCode
   * Creates a facility or merges the edit into the matching one
   */
  public async submitEdit(req: Request, res: Response): Promise<void> {
    const body: FacilityEditBody = req.body;
    const result = await this.catalog.submitEdit({
      ...body,
      locationCode: req.params.locationCode,
    });

    res.status(result.outcome === "created" ? 201 : 200).json({
      success: true,
      data: result,
    });
  }

  /**
   * DELETE /api/v1/facilities/:locationCode/:facilityId
   */
  public async deleteFacility(req: Request, res: Response): Promise<void> {
    const { locationCode, facilityId } = req.params;
    await this.catalog.deleteFacility(locationCode, facilityId);
    res.status(204).send();
  }
}
