/**
 * backend/src/modules/members/member.schemas.ts
 */

import { z } from 'zod';
import { MEMBER_STATUSES } from './member.types';

export const createMemberSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3)
    .max(150)
    .regex(/^[A-Za-z0-9@.+_-]+$/, 'Username may only contain letters, digits and @ . + - _'),
  email: z.string().trim().email().max(254),
  firstName: z.string().trim().max(150).default(''),
  lastName: z.string().trim().max(150).default(''),
  memberNumber: z
    .string()
    .trim()
    .min(1)
    .max(32)
    .nullish()
    .transform((v) => v ?? null),
  status: z.enum(MEMBER_STATUSES).default('non_financial'),
  duesCurrent: z.boolean().default(false),
  isOfficer: z.boolean().default(false),
  isStaff: z.boolean().default(false),
});

export const updateMemberSchema = z
  .object({
    memberNumber: z.string().trim().min(1).max(32).nullable().optional(),
    status: z.enum(MEMBER_STATUSES).optional(),
    duesCurrent: z.boolean().optional(),
    isOfficer: z.boolean().optional(),
    isStaff: z.boolean().optional(),
  })
  .strict()
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
    message: 'At least one field is required',
  });

export const memberParamsSchema = z.object({
  memberId: z.string().uuid(),
});
