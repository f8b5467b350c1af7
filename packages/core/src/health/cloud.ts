import { z } from "zod";
import type { CloudConfig } from "../config/types.js";
import { describeError } from "../infra/errors.js";
import { fetchWithTimeout, readJsonSafe } from "../infra/http.js";
import type { AppLogger } from "../infra/logger.js";
import type { AccessTokenProvider } from "./azure-auth.js";
import type {
  CloudHealth,
  CloudResource,
  HealthCollector,
  StorageResource,
} from "./types.js";

const VM_GOOD_STATES = new Set(["running", "stopped", "deallocated"]);

const ResourceListSchema = z.object({
  value: z
    .array(
      z.object({
        id: z.string().optional(),
        name: z.string().optional(),
        properties: z
          .object({
            state: z.string().optional(),
            provisioningState: z.string().optional(),
          })
          .optional(),
      }),
    )
    .default([]),
});

type ResourceItem = z.infer<typeof ResourceListSchema>["value"][number];

const InstanceViewSchema = z.object({
  statuses: z.array(z.object({ code: z.string().optional() })).default([]),
});

interface ListingOutcome<T> {
  items: T[];
  warnings: string[];
}

export function emptyCloudHealth(
  configured: boolean,
  status: CloudHealth["status"],
  message: string,
  warnings: string[] = [],
): CloudHealth {
  return {
    configured,
    status,
    message,
    vms: [],
    appServices: [],
    storageAccounts: [],
    warnings,
  };
}

/**
 * Azure Resource Manager inventory for one resource group. Each resource
 * type is listed independently; a failing listing becomes a warning and
 * never hides the other two.
 */
export class CloudHealthCollector implements HealthCollector<CloudHealth> {
  constructor(
    private readonly config: CloudConfig,
    private readonly tokens: AccessTokenProvider,
    private readonly logger?: AppLogger,
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.subscriptionId && this.config.resourceGroup);
  }

  async collect(): Promise<CloudHealth> {
    if (!this.isConfigured()) {
      return emptyCloudHealth(
        false,
        "not_configured",
        "Set AZURE_SUBSCRIPTION_ID and AZURE_RESOURCE_GROUP to enable Azure checks.",
      );
    }

    let token: string;
    try {
      token = await this.tokens.getToken();
    } catch (err) {
      const reason = describeError(err);
      this.logger?.warn(`Azure auth failed: ${reason}`);
      return emptyCloudHealth(true, "auth_failed", `Azure auth failed: ${reason}`, [
        `AZURE: auth_failed - ${reason}`,
      ]);
    }

    const headers = { Authorization: `Bearer ${token}` };
    const [vms, apps, storage] = await Promise.all([
      this.listing("VM", () => this.listVms(headers)),
      this.listing("AppService", () => this.listAppServices(headers)),
      this.listing("Storage", () => this.listStorage(headers)),
    ]);

    const warnings = [...vms.warnings, ...apps.warnings, ...storage.warnings];
    return {
      configured: true,
      status: warnings.length === 0 ? "ok" : "warnings",
      message: "Azure checks executed.",
      vms: vms.items,
      appServices: apps.items,
      storageAccounts: storage.items,
      warnings,
    };
  }

  private async listing<T>(
    kind: string,
    run: () => Promise<ListingOutcome<T>>,
  ): Promise<ListingOutcome<T>> {
    try {
      return await run();
    } catch (err) {
      const reason = describeError(err);
      this.logger?.warn(`Azure ${kind} listing failed: ${reason}`);
      return { items: [], warnings: [`AZURE: ${kind} list failed - ${reason}`] };
    }
  }

  private providerUrl(provider: string, apiVersion: string): string {
    const { managementBaseUrl, subscriptionId, resourceGroup } = this.config;
    return (
      `${managementBaseUrl}/subscriptions/${encodeURIComponent(subscriptionId)}` +
      `/resourceGroups/${encodeURIComponent(resourceGroup)}` +
      `/providers/${provider}?api-version=${apiVersion}`
    );
  }

  private async listResources(
    url: string,
    headers: Record<string, string>,
  ): Promise<ResourceItem[]> {
    const response = await fetchWithTimeout(url, { headers }, this.config.timeoutMs);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }
    const parsed = ResourceListSchema.safeParse(await readJsonSafe(response));
    if (!parsed.success) {
      throw new Error("unexpected listing payload");
    }
    return parsed.data.value;
  }

  private async listVms(headers: Record<string, string>): Promise<ListingOutcome<CloudResource>> {
    const apiVersion = this.config.apiVersions.vm;
    const items = await this.listResources(
      this.providerUrl("Microsoft.Compute/virtualMachines", apiVersion),
      headers,
    );

    const vms = await Promise.all(
      items.map(async (item): Promise<CloudResource> => ({
        name: item.name ?? "unknown",
        state: item.id ? await this.vmPowerState(item.id, apiVersion, headers) : "unknown",
      })),
    );

    const warnings = vms
      .filter((vm) => !VM_GOOD_STATES.has(vm.state))
      .map((vm) => `AZURE: VM ${vm.name} state=${vm.state}`);
    return { items: vms, warnings };
  }

  private async vmPowerState(
    vmId: string,
    apiVersion: string,
    headers: Record<string, string>,
  ): Promise<string> {
    const response = await fetchWithTimeout(
      `${this.config.managementBaseUrl}${vmId}/instanceView?api-version=${apiVersion}`,
      { headers },
      this.config.timeoutMs,
    );
    if (response.status !== 200) return "unknown";

    const parsed = InstanceViewSchema.safeParse(await readJsonSafe(response));
    if (!parsed.success) return "unknown";

    for (const status of parsed.data.statuses) {
      if (status.code?.startsWith("PowerState/")) {
        return status.code.slice("PowerState/".length);
      }
    }
    return "unknown";
  }

  private async listAppServices(
    headers: Record<string, string>,
  ): Promise<ListingOutcome<CloudResource>> {
    const items = await this.listResources(
      this.providerUrl("Microsoft.Web/sites", this.config.apiVersions.web),
      headers,
    );
    const apps = items.map((item) => ({
      name: item.name ?? "unknown",
      state: item.properties?.state ?? "unknown",
    }));
    const warnings = apps
      .filter((app) => app.state.toLowerCase() !== "running")
      .map((app) => `AZURE: AppService ${app.name} state=${app.state}`);
    return { items: apps, warnings };
  }

  private async listStorage(
    headers: Record<string, string>,
  ): Promise<ListingOutcome<StorageResource>> {
    const items = await this.listResources(
      this.providerUrl("Microsoft.Storage/storageAccounts", this.config.apiVersions.storage),
      headers,
    );
    const accounts = items.map((item) => ({
      name: item.name ?? "unknown",
      provisioningState: item.properties?.provisioningState ?? "unknown",
    }));
    const warnings = accounts
      .filter((acct) => acct.provisioningState.toLowerCase() !== "succeeded")
      .map((acct) => `AZURE: Storage ${acct.name} provisioningState=${acct.provisioningState}`);
    return { items: accounts, warnings };
  }
}
