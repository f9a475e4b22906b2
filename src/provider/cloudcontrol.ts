import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { Agent, fetch as undiciFetch } from "undici";
import { z } from "zod";
import { resolveRegionHost } from "./regions.js";
import type {
  BackupClient,
  BackupClientRef,
  BackupDetails,
  BackupService,
  NewBackupClientRequest,
  ProviderConfig,
  TargetUpdate,
} from "./types.js";
import { log } from "../util/logger.js";

const API_BASE = "/oec/0.9";
const BACKUP_NS = "http://oec.api.opsource.net/schemas/backup";
const ACCEPTED_RESULTS = new Set(["SUCCESS", "IN_PROGRESS"]);

// ── HTTP seam ──
export interface HttpRequestInit {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export function createFetch(verifySslCert: boolean): FetchLike {
  if (verifySslCert) return (url, init) => undiciFetch(url, init);
  const dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

export class CloudControlApiError extends Error {
  readonly status: number;
  readonly resultCode?: string;

  constructor(message: string, status: number, resultCode?: string) {
    super(message);
    this.name = "CloudControlApiError";
    this.status = status;
    this.resultCode = resultCode;
  }
}

// ── Response shapes (namespace prefixes stripped, attributes under "@_") ──
const StatusXml = z.object({
  Status: z.object({
    operation: z.string().optional(),
    result: z.string(),
    resultDetail: z.string().default(""),
    resultCode: z.string().optional(),
    additionalInformation: z.array(z.object({
      "@_name": z.string(),
      value: z.string().default(""),
    })).default([]),
  }),
});

const AccountXml = z.object({
  Account: z.object({ orgId: z.string().min(1) }),
});

const BackupClientXml = z.object({
  "@_id": z.string(),
  "@_type": z.string(),
  "@_status": z.string().optional(),
  storagePolicyName: z.string().default(""),
  schedulePolicyName: z.string().default(""),
  downloadUrl: z.string().optional(),
  alerting: z.object({
    "@_trigger": z.string(),
    emailAddress: z.array(z.string()).default([]),
  }).optional(),
});

const BackupDetailsXml = z.object({
  BackupDetails: z.object({
    "@_assetId": z.string().optional(),
    "@_servicePlan": z.string(),
    "@_state": z.string().optional(),
    backupClient: z.array(BackupClientXml).default([]),
  }),
});

const ARRAY_TAGS = new Set(["backupClient", "emailAddress", "additionalInformation"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  isArray: (name) => ARRAY_TAGS.has(name),
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
});

function parseXml<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, xml: string, what: string): T {
  const result = schema.safeParse(parser.parse(xml));
  if (!result.success) {
    throw new CloudControlApiError(`Unexpected ${what} response: ${result.error.issues[0]?.message ?? "invalid document"}`, 200);
  }
  return result.data;
}

/**
 * BackupService over the CloudControl 0.9 backup API. Every call is a single
 * request; nothing is retried.
 */
export class CloudControlBackupService implements BackupService {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly fetchImpl: FetchLike;
  private orgId: string | undefined;

  constructor(config: ProviderConfig, fetchImpl?: FetchLike) {
    const host = config.apiHost || resolveRegionHost(config.region);
    this.baseUrl = `https://${host}${API_BASE}`;
    this.authHeader = `Basic ${Buffer.from(`${config.userId}:${config.password}`).toString("base64")}`;
    this.fetchImpl = fetchImpl ?? createFetch(config.verifySslCert);
  }

  async getBackupDetails(targetId: string): Promise<BackupDetails> {
    const xml = await this.request("GET", `server/${encodeURIComponent(targetId)}/backup`);
    const { BackupDetails: d } = parseXml(BackupDetailsXml, xml, "backup details");
    return {
      targetId: d["@_assetId"] ?? targetId,
      servicePlan: d["@_servicePlan"],
      state: d["@_state"],
      clients: d.backupClient.map((c): BackupClient => ({
        id: c["@_id"],
        type: c["@_type"],
        status: c["@_status"],
        storagePolicy: c.storagePolicyName,
        schedulePolicy: c.schedulePolicyName,
        downloadUrl: c.downloadUrl || undefined,
        alerting: c.alerting ? { trigger: c.alerting["@_trigger"], emails: c.alerting.emailAddress } : undefined,
      })),
    };
  }

  async addClient(targetId: string, request: NewBackupClientRequest): Promise<BackupClientRef> {
    const body = builder.build({
      NewBackupClient: {
        "@_xmlns": BACKUP_NS,
        type: request.clientType,
        storagePolicyName: request.storagePolicy,
        schedulePolicyName: request.schedulePolicy,
        alerting: {
          "@_trigger": request.notifyTrigger,
          emailAddress: request.notifyEmail,
        },
      },
    });
    const xml = await this.request("POST", `server/${encodeURIComponent(targetId)}/backup/client`, body);
    const { Status: status } = parseXml(StatusXml, xml, "add client");
    const info = new Map(status.additionalInformation.map((i): [string, string] => [i["@_name"], i.value]));
    return { id: info.get("backupClientId") ?? "", downloadUrl: info.get("downloadUrl") || undefined };
  }

  async removeClient(targetId: string, client: BackupClient): Promise<boolean> {
    const xml = await this.request(
      "GET",
      `server/${encodeURIComponent(targetId)}/backup/client/${encodeURIComponent(client.id)}?disable`,
    );
    const { Status: status } = parseXml(StatusXml, xml, "remove client");
    return ACCEPTED_RESULTS.has(status.result);
  }

  async updateTarget(targetId: string, update: TargetUpdate): Promise<boolean> {
    const body = builder.build({
      ModifyBackup: { "@_xmlns": BACKUP_NS, servicePlan: update.servicePlan },
    });
    const xml = await this.request("POST", `server/${encodeURIComponent(targetId)}/backup/modify`, body);
    const { Status: status } = parseXml(StatusXml, xml, "modify backup");
    return ACCEPTED_RESULTS.has(status.result);
  }

  private async resolveOrgId(): Promise<string> {
    if (this.orgId) return this.orgId;
    const xml = await this.send("GET", `${this.baseUrl}/myaccount`);
    this.orgId = parseXml(AccountXml, xml, "account").Account.orgId;
    log.debug(`Resolved organisation ${this.orgId}`);
    return this.orgId;
  }

  private async request(method: HttpRequestInit["method"], path: string, body?: string): Promise<string> {
    const orgId = await this.resolveOrgId();
    return this.send(method, `${this.baseUrl}/${orgId}/${path}`, body);
  }

  private async send(method: HttpRequestInit["method"], url: string, body?: string): Promise<string> {
    log.trace(`${method} ${url}`);
    const headers: Record<string, string> = {
      Authorization: this.authHeader,
      Accept: "text/xml",
    };
    if (body !== undefined) headers["Content-Type"] = "text/xml";
    const res = await this.fetchImpl(url, { method, headers, body });
    const text = await res.text();
    if (!res.ok) throw toApiError(res, text);
    return text;
  }
}

function toApiError(res: HttpResponse, text: string): CloudControlApiError {
  if (res.status === 401) return new CloudControlApiError("Unauthorized: invalid user id or password", 401);
  try {
    const status = StatusXml.safeParse(parser.parse(text));
    if (status.success && status.data.Status.resultDetail) {
      return new CloudControlApiError(status.data.Status.resultDetail, res.status, status.data.Status.resultCode);
    }
  } catch (err) {
    log.debug(`Error body is not XML: ${err instanceof Error ? err.message : err}`);
  }
  return new CloudControlApiError(`${res.status} ${res.statusText}`, res.status);
}
