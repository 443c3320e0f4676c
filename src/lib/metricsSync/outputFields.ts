import type { FieldWrites } from "../boardStore/types";
import { METRIC_NAMES, type MetricSet } from "../underwritingMetrics/types";
import { formatMetricValue } from "../underwritingMetrics/format";
import type { OutputFieldMap } from "./fieldMap";

/**
 * Output field map for one record: a formatted value for every present
 * metric, an explicit clear for every absent one. Keys follow metric order,
 * so identical inputs always serialize identically.
 */
export function buildFieldWrites(metrics: MetricSet, outputFields: OutputFieldMap): FieldWrites {
  const writes: FieldWrites = {};
  for (const name of METRIC_NAMES) {
    const fieldId = outputFields[name];
    if (!fieldId) continue;
    const metric = metrics[name];
    writes[fieldId] =
      metric.kind === "present"
        ? { kind: "number", value: formatMetricValue(metric.value) }
        : { kind: "clear" };
  }
  return writes;
}
