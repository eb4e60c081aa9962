/**
 * Zod schemas for validating tool inputs
 * Field-format rules for contacts live here; the store only checks presence
 */

import { z } from "zod";
import { normalizePhone } from "@contactbook/store";

/** Hard cap on bulk tool items; the configured maxBatch applies below it */
export const MAX_BATCH_ITEMS = 10000;

export const IdSchema = z.string().min(1, "id must be non-empty").max(200);

export const NameSchema = z
  .string()
  .max(200, "name cannot exceed 200 characters")
  .superRefine((val, ctx) => {
    if (val.trim() === "") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "name must be a non-empty string",
      });
    }
  });

export const PhoneSchema = z.string().superRefine((val, ctx) => {
  // Validate the same key the store indexes
  const digits = normalizePhone(val);
  if (!/^\d+$/.test(digits) || digits.length < 10) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "phone must contain at least 10 digits, optionally separated by spaces, dashes, dots or parentheses",
    });
  }
});

export const EmailSchema = z.string().superRefine((val, ctx) => {
  const email = val.trim();
  const at = email.lastIndexOf("@");
  const domain = email.slice(at + 1);
  if (at <= 0 || /\s/.test(email) || !domain.includes(".") || domain.startsWith(".") || domain.endsWith(".")) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "email must look like local@domain.tld",
    });
  }
});

// A new contact: every field required, nothing else accepted
export const ContactInputSchema = z
  .object({
    name: NameSchema,
    phone: PhoneSchema,
    email: EmailSchema,
  })
  .strict();

// An update: id plus any subset of the contact fields
export const ContactUpdateSchema = z
  .object({
    id: IdSchema,
    name: NameSchema.optional(),
    phone: PhoneSchema.optional(),
    email: EmailSchema.optional(),
  })
  .strict();

export const SearchModeSchema = z.enum(["token", "substring"]);

// Tool input schemas

export const CreateContactsInputSchema = z.object({
  contacts: z
    .array(ContactInputSchema)
    .min(1, "contacts cannot be empty")
    .max(MAX_BATCH_ITEMS),
});

export const UpdateContactsInputSchema = z.object({
  updates: z
    .array(ContactUpdateSchema)
    .min(1, "updates cannot be empty")
    .max(MAX_BATCH_ITEMS),
});

export const DeleteContactsInputSchema = z.object({
  ids: z.array(IdSchema).min(1, "ids cannot be empty").max(MAX_BATCH_ITEMS),
});

export const SearchContactsInputSchema = z.object({
  query: z.string().max(500, "query cannot exceed 500 characters"),
  limit: z.number().int().positive().max(1000, "limit cannot exceed 1000").default(100),
  mode: SearchModeSchema.optional(),
});

export const GetContactInputSchema = z.object({
  id: IdSchema,
});

export const ListContactsInputSchema = z
  .object({
    limit: z.number().int().positive().max(1000, "limit cannot exceed 1000").default(100),
    skip: z.number().int().min(0).max(10000, "skip cannot exceed 10000").default(0),
  })
  .default({});

export const HealthInputSchema = z.object({}).default({});
