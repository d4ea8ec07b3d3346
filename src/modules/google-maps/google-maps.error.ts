import { HttpStatus } from "@nestjs/common";
import { AppException } from "../../common/errors/app.exception";
import { UPSTREAM_FAILURE_MESSAGE } from "./google-maps.const";

export const GoogleMapsErrorCode = {
  UPSTREAM_PROVIDER_ERROR: "UPSTREAM_PROVIDER_ERROR",
} as const;

/**
 * Raised when the provider cannot be reached or answers with something we
 * cannot map. The response carries no provider detail.
 */
export class GoogleMapsUpstreamException extends AppException {
  constructor() {
    super(
      GoogleMapsErrorCode.UPSTREAM_PROVIDER_ERROR,
      UPSTREAM_FAILURE_MESSAGE,
      HttpStatus.INTERNAL_SERVER_ERROR,
      { title: "Upstream Provider Error" },
    );
  }
}
