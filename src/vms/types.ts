/**
 * Azure VMs — Type Definitions
 */

export type VMSummary = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  size: string;
  osType: string;
  provisioningState: string;
};

export type VMStatus = {
  name: string;
  /** Display status of the PowerState/* instance view entry, e.g. "VM running". */
  status: string;
  location: string;
  size: string;
  provisioningState: string;
};

export type VMListOptions = {
  resourceGroup?: string;
};
