import { sql } from "drizzle-orm";
import { pgTable, text, varchar, integer, decimal, timestamp, boolean, jsonb, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Project status enum - unknown stored values decode to LOCKED (see services/project-status)
export const projectStatusEnum = z.enum([
  'IN_REVIEW',
  'LOCKED',
  'ACTIVE',
  'SUSPENDED',
  'STANDBY',
  'MAINTENANCE',
  'COMPLETED',
  'DECLINED',
  'ARCHIVE',
]);
export type ProjectStatus = z.infer<typeof projectStatusEnum>;

export const expenseStatusEnum = z.enum(['pending', 'approved', 'rejected']);
export type ExpenseStatus = z.infer<typeof expenseStatusEnum>;

export const tempApproverStatusEnum = z.enum(['pending', 'accepted', 'rejected', 'active', 'expired']);
export type TempApproverStatus = z.infer<typeof tempApproverStatusEnum>;

export const contractorModeEnum = z.enum(['Labour-Only', 'Turnkey']);
export type ContractorMode = z.infer<typeof contractorModeEnum>;

export const phaseRequestStatusEnum = z.enum(['PENDING', 'ACCEPTED', 'REJECTED']);
export type PhaseRequestStatus = z.infer<typeof phaseRequestStatusEnum>;

// Business dates are stored as "dd/MM/yyyy" text, never as timestamps
const storeDateSchema = z.string().regex(/^\d{2}\/\d{2}\/\d{4}$/, "Date must be in dd/MM/yyyy format");

export interface DepartmentLineItem {
  itemType: string;
  item: string;
  spec: string;
  quantity: number;
  uom: string; // Unit of measurement
  unitPrice: number;
}

// Projects
export const projects = pgTable("projects", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull(),
  status: text("status").notNull().default("IN_REVIEW"),
  plannedDate: text("planned_date"), // Project becomes ACTIVE when this date arrives
  handoverDate: text("handover_date"), // Latest phase end date
  initialHandoverDate: text("initial_handover_date"), // Only follows handoverDate while LOCKED or IN_REVIEW
  maintenanceDate: text("maintenance_date"),
  isSuspended: boolean("is_suspended").notNull().default(false),
  suspendedDate: text("suspended_date"), // Suspended until this date
  suspensionReason: text("suspension_reason"),
  teamMembers: text("team_members").array().notNull().default(sql`'{}'::text[]`),
  managerIds: text("manager_ids").array().notNull().default(sql`'{}'::text[]`), // 0 or 1 active manager
  tempApproverId: varchar("temp_approver_id"),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
  updatedAt: timestamp("updated_at").notNull().default(sql`now()`),
});

// Phases
export const phases = pgTable("phases", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  projectId: varchar("project_id").notNull().references(() => projects.id),
  phaseName: text("phase_name").notNull(),
  phaseNumber: integer("phase_number").notNull(), // 1-based, renumbered on deletion
  startDate: text("start_date"), // null = unbounded
  endDate: text("end_date"), // null = unbounded
  departments: jsonb("departments").$type<Record<string, number>>().notNull().default(sql`'{}'::jsonb`), // Legacy budget map
  isEnabled: boolean("is_enabled"), // null means enabled
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
  updatedAt: timestamp("updated_at").notNull().default(sql`now()`),
}, (table) => ({
  projectIdx: index("phases_project_idx").on(table.projectId),
}));

// Departments (supersede the legacy phase budget map when present)
export const departments = pgTable("departments", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  projectId: varchar("project_id").notNull().references(() => projects.id),
  phaseId: varchar("phase_id").notNull().references(() => phases.id),
  name: text("name").notNull(),
  contractorMode: text("contractor_mode").notNull(), // Labour-Only, Turnkey
  lineItems: jsonb("line_items").$type<DepartmentLineItem[]>().notNull().default(sql`'[]'::jsonb`),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
  updatedAt: timestamp("updated_at").notNull().default(sql`now()`),
}, (table) => ({
  phaseIdx: index("departments_phase_idx").on(table.projectId, table.phaseId),
}));

// Expenses
export const expenses = pgTable("expenses", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  projectId: varchar("project_id").notNull().references(() => projects.id),
  phaseId: varchar("phase_id"), // No FK: phases can be deleted while expenses remain
  phaseName: text("phase_name"),
  department: text("department").notNull(), // "<phaseId>_<department name>"
  date: text("date").notNull(),
  amount: decimal("amount", { precision: 12, scale: 2 }).notNull(),
  description: text("description"),
  status: text("status").notNull().default("pending"), // pending, approved, rejected
  remark: text("remark"),
  isAdmin: boolean("is_admin").notNull().default(false), // Escalated at submission time
  submittedBy: varchar("submitted_by").notNull(),
  approvedBy: varchar("approved_by"),
  rejectedBy: varchar("rejected_by"),
  approvedAt: timestamp("approved_at"),
  rejectedAt: timestamp("rejected_at"),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
  updatedAt: timestamp("updated_at").notNull().default(sql`now()`),
}, (table) => ({
  projectStatusIdx: index("expenses_project_status_idx").on(table.projectId, table.status),
}));

// Temporary approvers (approval delegation windows)
export const tempApprovers = pgTable("temp_approvers", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  projectId: varchar("project_id").notNull().references(() => projects.id),
  approverId: varchar("approver_id").notNull(),
  startDate: timestamp("start_date").notNull(),
  endDate: timestamp("end_date").notNull(),
  status: text("status").notNull().default("pending"), // pending, accepted, rejected, active, expired
  rejectionReason: text("rejection_reason"),
  approvedExpense: text("approved_expense").array().notNull().default(sql`'{}'::text[]`),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
  updatedAt: timestamp("updated_at").notNull().default(sql`now()`),
}, (table) => ({
  projectApproverIdx: index("temp_approvers_project_approver_idx").on(table.projectId, table.approverId),
}));

// Phase extension requests raised by the project team
export const phaseRequests = pgTable("phase_requests", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  projectId: varchar("project_id").notNull().references(() => projects.id),
  phaseId: varchar("phase_id").notNull().references(() => phases.id),
  requestedBy: varchar("requested_by").notNull(),
  reason: text("reason").notNull(),
  extendedDate: text("extended_date").notNull(), // Requested new phase end date
  status: text("status").notNull().default("PENDING"), // PENDING, ACCEPTED, REJECTED
  reasonToReact: text("reason_to_react"),
  decidedBy: varchar("decided_by"),
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
  updatedAt: timestamp("updated_at").notNull().default(sql`now()`),
}, (table) => ({
  projectStatusIdx: index("phase_requests_project_status_idx").on(table.projectId, table.status),
}));

// Audit log of phase start/end date changes
export const phaseTimelineChanges = pgTable("phase_timeline_changes", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  projectId: varchar("project_id").notNull().references(() => projects.id),
  phaseId: varchar("phase_id").notNull(), // No FK: the log outlives deleted phases
  previousStartDate: text("previous_start_date"),
  previousEndDate: text("previous_end_date"),
  newStartDate: text("new_start_date"),
  newEndDate: text("new_end_date"),
  changedBy: varchar("changed_by").notNull(),
  requestId: varchar("request_id"), // Set when an accepted extension request made the change
  createdAt: timestamp("created_at").notNull().default(sql`now()`),
}, (table) => ({
  phaseIdx: index("phase_timeline_changes_phase_idx").on(table.projectId, table.phaseId),
}));

// Insert schemas
export const insertProjectSchema = createInsertSchema(projects).omit({
  id: true,
  status: true,
  isSuspended: true,
  suspendedDate: true,
  suspensionReason: true,
  tempApproverId: true,
  initialHandoverDate: true,
  createdAt: true,
  updatedAt: true,
}).extend({
  name: z.string().trim().min(1, "Project name is required"),
  plannedDate: storeDateSchema.nullish(),
  handoverDate: storeDateSchema.nullish(),
  maintenanceDate: storeDateSchema.nullish(),
  managerIds: z.array(z.string().trim().min(1)).max(1, "A project has at most one active manager").default([]),
  teamMembers: z.array(z.string().trim().min(1)).default([]),
});

// Request schemas
export const insertPhaseRequestSchema = z.object({
  phaseName: z.string().trim().min(1, "Phase name is required"),
  startDate: storeDateSchema.nullish(),
  endDate: storeDateSchema.nullish(),
  isEnabled: z.boolean().optional(),
  departments: z.record(z.string(), z.number().nonnegative()).default({}),
});

// Absent keys are left unchanged; null clears a date
export const updatePhaseRequestSchema = z.object({
  phaseName: z.string().trim().min(1, "Phase name is required").optional(),
  startDate: storeDateSchema.nullish(),
  endDate: storeDateSchema.nullish(),
  isEnabled: z.boolean().optional(),
}).refine(
  (update) => Object.values(update).some((value) => value !== undefined),
  { message: "Nothing to update" },
);

export const phaseExtensionRequestSchema = z.object({
  extendedDate: storeDateSchema,
  reason: z.string().trim().min(1, "A reason is required"),
});

export const phaseRequestDecisionSchema = z.object({
  remark: z.string().trim().max(1000).optional(),
});

export const departmentLineItemSchema = z.object({
  itemType: z.string().default(""),
  item: z.string().default(""),
  spec: z.string().default(""),
  quantity: z.number().nonnegative(),
  uom: z.string().default(""),
  unitPrice: z.number().nonnegative(),
});

export const insertDepartmentRequestSchema = z.object({
  name: z.string().trim().min(1, "Department name is required"),
  contractorMode: contractorModeEnum,
  lineItems: z.array(departmentLineItemSchema).default([]),
});

export const submitExpenseRequestSchema = z.object({
  phaseId: z.string().trim().min(1, "Phase is required"),
  department: z.string().trim().min(1, "Department is required"),
  date: storeDateSchema,
  // Stored as decimal(12,2); escalation must see the stored value
  amount: z.number().positive("Amount must be greater than 0").multipleOf(0.01, "Amount cannot have more than two decimal places"),
  description: z.string().trim().optional(),
});

export const expenseDecisionRequestSchema = z.object({
  remark: z.string().trim().max(1000).optional(),
});

export const suspendProjectRequestSchema = z.object({
  reason: z.string().trim().min(1, "Suspension reason is required"),
  suspendedUntil: storeDateSchema.nullish(), // null = until resumed by hand
});

export const assignTempApproverRequestSchema = z.object({
  approverId: z.string().trim().min(1, "Approver is required"),
  startDate: z.coerce.date(),
  endDate: z.coerce.date(),
});

export const rejectTempApproverRequestSchema = z.object({
  reason: z.string().trim().min(1, "A rejection reason is required"),
});

// Types
export type ProjectRow = typeof projects.$inferSelect;
export type InsertProject = z.infer<typeof insertProjectSchema>;

export type PhaseRow = typeof phases.$inferSelect;
export type InsertPhaseRequest = z.infer<typeof insertPhaseRequestSchema>;

export type DepartmentRow = typeof departments.$inferSelect;
export type InsertDepartmentRequest = z.infer<typeof insertDepartmentRequestSchema>;

export type ExpenseRow = typeof expenses.$inferSelect;

export type TempApproverRow = typeof tempApprovers.$inferSelect;

export type PhaseRequestRow = typeof phaseRequests.$inferSelect;
export type PhaseTimelineChangeRow = typeof phaseTimelineChanges.$inferSelect;
