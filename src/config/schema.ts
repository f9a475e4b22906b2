import { z } from "zod";
import { REGION_CODES, type RegionCode } from "../provider/regions.js";

// ── Choices ──
export const CLIENT_TYPES = ["FA.Win", "FA.AD", "FA.Linux", "MySQL", "PostgreSQL"] as const;
export const SCHEDULE_POLICIES = ["12AM - 6AM", "6AM - 12PM", "12PM - 6PM", "6PM - 12AM"] as const;
export const NOTIFY_TRIGGERS = ["ON_FAILURE", "ON_SUCCESS"] as const;
export const DESIRED_STATES = ["present", "absent"] as const;

const STORAGE_POLICY_LENGTHS = [
  "14 Day", "30 Day", "60 Day", "90 Day", "180 Day",
  "1 Year", "2 Year", "3 Year", "4 Year", "5 Year", "6 Year", "7 Year",
];

export const STORAGE_POLICIES: readonly string[] = STORAGE_POLICY_LENGTHS.flatMap((length) => [
  `${length} Storage Policy`,
  `${length} Storage Policy + Secondary Copy`,
]);

export type ClientType = (typeof CLIENT_TYPES)[number];
export type SchedulePolicy = (typeof SCHEDULE_POLICIES)[number];
export type NotifyTrigger = (typeof NOTIFY_TRIGGERS)[number];
export type DesiredState = (typeof DESIRED_STATES)[number];

export const DEFAULT_NOTIFY_EMAIL = "nobody@example.com";
export const DEFAULT_REGION: RegionCode = "na";

// ── Module parameters ──
export const ModuleParamsSchema = z.object({
  state: z.enum(DESIRED_STATES).default("present"),
  node_ids: z.array(
    z.string().trim().min(1, "node id must not be empty").refine((v) => !v.includes("="), {
      message: "node id must not contain \"=\"",
    }),
  ).min(1, "at least one node id is required"),
  client_type: z.enum(CLIENT_TYPES),
  storage_policy: z.string().refine((v) => STORAGE_POLICIES.includes(v), {
    message: "not a known storage policy",
  }).optional(),
  schedule_policy: z.enum(SCHEDULE_POLICIES).optional(),
  notify_email: z.string().default(DEFAULT_NOTIFY_EMAIL),
  notify_trigger: z.enum(NOTIFY_TRIGGERS).default("ON_FAILURE"),
  region: z.enum(REGION_CODES).default(DEFAULT_REGION),
  verify_ssl_cert: z.boolean().default(true),
}).strict();

export type ModuleParams = z.infer<typeof ModuleParamsSchema>;

// ── Config file ──
const CredentialsSchema = z.object({
  userId: z.string().optional(),
  password: z.string().optional(),
});

export const CcBackupConfigSchema = z.object({
  credentials: CredentialsSchema.optional(),
  region: z.string().optional(),
  apiHost: z.string().optional(),
  verifySslCert: z.boolean().optional(),
  logFile: z.string().optional(),
});

export type CcBackupConfig = z.infer<typeof CcBackupConfigSchema>;

export const DEFAULT_CONFIG: CcBackupConfig = {
  region: DEFAULT_REGION,
  verifySslCert: true,
};
