// Lambda handler for CSV downloads of a bhavcopy query.
//
// Endpoint: GET /bhavcopy/export
// Query params:
//   - kind: filtered | complete | top (default filtered)
//   - the same date, filter and sort params as GET /bhavcopy
// Behavior:
//   - 200 text/csv with Content-Disposition naming <prefix>_<kind>_<yyyyMMdd>.csv
//   - 404 when nothing was published for the date, 502 on provider failure
import { buildBhavcopyExport } from "@src/bhavcopy/build_view";
import { createBhavcopyDependencies } from "@src/bhavcopy/dependencies";
import { createBhavcopyExportQuerySchema } from "@src/bhavcopy/query_schema";
import { withRequestContext } from "@src/util/logger";
import {
  ApiEvent,
  ApiResponse,
  csvResponse,
  LambdaContext,
  response,
} from "./shared/http";

const deps = createBhavcopyDependencies();
const querySchema = createBhavcopyExportQuerySchema();

export const handler = async (
  event: ApiEvent,
  context: LambdaContext = {}
): Promise<ApiResponse> => {
  const logger = withRequestContext("functions/export_bhavcopy", context);
  try {
    const parsed = querySchema.safeParse(event.queryStringParameters ?? {});
    if (!parsed.success) {
      return response(400, {
        error: "invalid query",
        issues: parsed.error.flatten().fieldErrors,
      });
    }

    const result = await buildBhavcopyExport(parsed.data, deps);
    if (result.status === "no_data") {
      return response(404, {
        error: "No data available for the selected date",
        suggestion: result.suggestion,
      });
    }
    if (result.status === "error") {
      return response(502, { error: result.message });
    }

    logger.info(
      { fileName: result.file.fileName, rows: result.file.rowCount },
      "bhavcopy export served"
    );
    return csvResponse(result.file.fileName, result.file.content);
  } catch (err) {
    logger.error({ err }, "export_bhavcopy error");
    return response(500, { error: "Internal server error" });
  }
};
