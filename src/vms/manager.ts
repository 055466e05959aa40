/**
 * Azure VM Manager
 *
 * Read-only access to Azure Virtual Machines via @azure/arm-compute.
 */

import type { VirtualMachine } from "@azure/arm-compute";
import type { CredentialProvider } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";
import { traceAzureCall } from "../diagnostics.js";
import { extractResourceGroup } from "../resource-id.js";
import type { VMListOptions, VMStatus, VMSummary } from "./types.js";

const UNKNOWN = "Unknown";

// =============================================================================
// AzureVMManager
// =============================================================================

export class AzureVMManager {
  constructor(
    private readonly credentials: CredentialProvider,
    private readonly subscriptionId: string,
    private readonly retryOptions: AzureRetryOptions = {},
  ) {}

  private async getComputeClient() {
    const { credential } = await this.credentials.getCredential();
    const { ComputeManagementClient } = await import("@azure/arm-compute");
    return new ComputeManagementClient(credential, this.subscriptionId);
  }

  /**
   * List virtual machines in the subscription, or in one resource group.
   */
  async listVMs(options?: VMListOptions): Promise<VMSummary[]> {
    const client = await this.getComputeClient();

    return traceAzureCall({ service: "compute", operation: "listVMs", target: options?.resourceGroup }, () =>
      withAzureRetry(async () => {
        const iterator = options?.resourceGroup
          ? client.virtualMachines.list(options.resourceGroup)
          : client.virtualMachines.listAll();

        const vms: VMSummary[] = [];
        for await (const vm of iterator) {
          vms.push(toVMSummary(vm));
        }
        return vms;
      }, this.retryOptions),
    );
  }

  /**
   * Find a VM by name, ignoring case. Returns null when no VM matches.
   */
  async findVM(name: string): Promise<VMSummary | null> {
    const wanted = name.toLowerCase();
    const vms = await this.listVMs();
    return vms.find((vm) => vm.name.toLowerCase() === wanted) ?? null;
  }

  /**
   * Get the power state and basic properties of a VM from its instance view.
   */
  async getVMStatus(resourceGroup: string, vmName: string): Promise<VMStatus> {
    const client = await this.getComputeClient();

    return traceAzureCall({ service: "compute", operation: "getVMStatus", target: `${resourceGroup}/${vmName}` }, () =>
      withAzureRetry(async () => {
        const vm = await client.virtualMachines.get(resourceGroup, vmName, { expand: "instanceView" });
        return {
          name: vm.name ?? vmName,
          status: parsePowerState(vm),
          location: vm.location,
          size: vm.hardwareProfile?.vmSize ?? UNKNOWN,
          provisioningState: vm.provisioningState ?? UNKNOWN,
        };
      }, this.retryOptions),
    );
  }
}

// =============================================================================
// Mapping Helpers
// =============================================================================

export function toVMSummary(vm: VirtualMachine): VMSummary {
  return {
    id: vm.id ?? "",
    name: vm.name ?? "",
    resourceGroup: extractResourceGroup(vm.id),
    location: vm.location,
    size: vm.hardwareProfile?.vmSize ?? UNKNOWN,
    osType: vm.storageProfile?.osDisk?.osType ?? UNKNOWN,
    provisioningState: vm.provisioningState ?? UNKNOWN,
  };
}

function parsePowerState(vm: VirtualMachine): string {
  const power = vm.instanceView?.statuses?.find((s) => s.code?.startsWith("PowerState/"));
  return power?.displayStatus ?? UNKNOWN;
}
