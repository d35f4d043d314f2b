import { z } from "zod";

export const LAB_STATUSES = ["created", "running", "stopped", "failed"] as const;
export type LabStatus = (typeof LAB_STATUSES)[number];

export const tmpfsMountSchema = z.object({
  path: z.string().startsWith("/"),
  size: z.string().regex(/^\d+[kmg]$/i, "size must look like 50m")
});
export type TmpfsMount = z.infer<typeof tmpfsMountSchema>;

export const resourceProfileSchema = z.object({
  memory: z.string().regex(/^\d+[kmg]$/i),
  cpus: z.string().regex(/^\d+(\.\d+)?$/),
  pidsLimit: z.number().int().positive()
});
export type ResourceProfile = z.infer<typeof resourceProfileSchema>;

export const labTypeSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/),
  name: z.string().min(1),
  image: z.string().min(1),
  category: z.enum(["web", "system", "challenge"]),
  difficulty: z.enum(["beginner", "intermediate", "advanced"]),
  port: z.number().int().min(1).max(65535),
  description: z.string().default(""),
  resources: resourceProfileSchema.partial().optional(),
  tmpfs: z.array(tmpfsMountSchema).optional()
});
export type LabTypeDefinition = z.infer<typeof labTypeSchema>;

export const labInstanceSchema = z.object({
  name: z.string().min(1),
  owner: z.string().min(1),
  labType: z.string().min(1),
  status: z.enum(LAB_STATUSES),
  ip: z.string().optional(),
  port: z.number().int(),
  createdAt: z.string(),
  startedAt: z.string().optional()
});
export type LabInstance = z.infer<typeof labInstanceSchema>;

export const registrySchema = z.record(z.string(), labInstanceSchema);
export type RegistryData = z.infer<typeof registrySchema>;

export const rateLimitEntrySchema = z.object({
  timestamps: z.array(z.number()),
  warned: z.boolean(),
  blockedUntil: z.number().nullable()
});
export type RateLimitEntry = z.infer<typeof rateLimitEntrySchema>;

export const rateLimitStoreSchema = z.record(z.string(), rateLimitEntrySchema);
export type RateLimitData = z.infer<typeof rateLimitStoreSchema>;

export const verifiedMemberSchema = z.object({
  identity: z.string(),
  verifiedAt: z.string(),
  grantedBy: z.string().optional()
});
export type VerifiedMember = z.infer<typeof verifiedMemberSchema>;

export const verifiedStoreSchema = z.record(z.string(), verifiedMemberSchema);
export type VerifiedData = z.infer<typeof verifiedStoreSchema>;

export interface QuotaPolicy {
  maxLabsPerUser: number;
  maxTotalLabs: number;
  ttlHours: number;
}

export interface RateLimitThresholds {
  soft: number;
  warn: number;
  hard: number;
  blockSeconds: number;
}
