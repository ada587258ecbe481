/**
 * Fill `{cluster_name}` and `{domain_name}` placeholders
 */
export function renderTemplate(
  template: string,
  clusterName: string,
  domainName: string
): string {
  return template
    .replaceAll("{cluster_name}", clusterName)
    .replaceAll("{domain_name}", domainName);
}
