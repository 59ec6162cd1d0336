import { AppError } from "../middleware/error.middleware";

export class DuplicateFacilityError extends AppError {
  constructor(
    public readonly locationCode: string,
    public readonly facilityName: string,
    public readonly existingId: string,
  ) {
    super(
      409,
      `An unverified facility named "${facilityName}" already exists at ${locationCode}; edit that entry instead`,
      true,
      "DUPLICATE_FACILITY",
    );
    Object.setPrototypeOf(this, DuplicateFacilityError.prototype);
  }
}

export class ProtectedRecordError extends AppError {
  constructor(public readonly facilityId: string) {
    super(409, `Facility ${facilityId} is verified and cannot be deleted`, true, "PROTECTED_RECORD");
    Object.setPrototypeOf(this, ProtectedRecordError.prototype);
  }
}

export class FacilityNotFoundError extends AppError {
  constructor(
    public readonly locationCode: string,
    public readonly facilityId: string,
  ) {
    super(404, `Facility ${facilityId} not found at ${locationCode}`, true, "FACILITY_NOT_FOUND");
    Object.setPrototypeOf(this, FacilityNotFoundError.prototype);
  }
}

export class InvalidFacilityEditError extends AppError {
  constructor(message: string) {
    super(400, message, true, "INVALID_FACILITY_EDIT");
    Object.setPrototypeOf(this, InvalidFacilityEditError.prototype);
  }
}

/**
 * Remote store call failed. Only raised on the push path; sync degrades to local data.
 */
export class RemoteStoreError extends AppError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly originalError?: unknown,
  ) {
    super(502, message, true, "REMOTE_STORE_ERROR");
    Object.setPrototypeOf(this, RemoteStoreError.prototype);
  }
}
