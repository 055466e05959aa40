/**
 * ARM resource ID helpers.
 *
 * IDs look like /subscriptions/{sub}/resourceGroups/{rg}/providers/{namespace}/{type}/{name}.
 */

/** Resource group segment of an ARM ID, or "Unknown" when absent. */
export function extractResourceGroup(resourceId: string | undefined): string {
  if (!resourceId) return "Unknown";
  return resourceId.split("/")[4] || "Unknown";
}

/** ARM ID of a virtual machine. */
export function vmResourceId(subscriptionId: string, resourceGroup: string, vmName: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.Compute/virtualMachines/${vmName}`;
}

/** Last path segment, e.g. "virtualMachines" for "Microsoft.Compute/virtualMachines". */
export function lastSegment(path: string): string {
  const parts = path.split("/");
  return parts[parts.length - 1] ?? path;
}
