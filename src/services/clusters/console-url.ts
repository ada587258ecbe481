import { renderTemplate } from "../../utils/template.js";
import { normalizeClusterName } from "../sync/transformer.js";

/**
 * Render the web console URL for a cluster
 */
export function buildConsoleUrl(
  template: string,
  clusterName: string,
  domainName: string
): string {
  return renderTemplate(template, normalizeClusterName(clusterName), domainName);
}
