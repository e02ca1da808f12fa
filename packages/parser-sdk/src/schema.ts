import { z } from 'zod';

export const jobListingSchema = z.object({
  title: z.string().min(1),
  company: z.string(),
  location: z.string(),
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'Listing link must be http(s)' }),
  snippet: z.string(),
});

export type ValidatedJobListing = z.infer<typeof jobListingSchema>;

export const jobDetailSchema = z.object({
  url: z.string().url(),
  title: z.string().min(1),
  company: z.string(),
  location: z.string(),
  salary: z.string().min(1).optional(),
  employmentType: z.string().min(1).optional(),
  experienceLevel: z.string().min(1).optional(),
  postedDate: z.string().min(1).optional(),
  description: z.string(),
  requirements: z.array(z.string().min(1)),
  responsibilities: z.array(z.string().min(1)),
  benefits: z.array(z.string().min(1)),
  companyDetails: z.object({
    description: z.string().optional(),
    size: z.string().optional(),
    website: z.string().url().optional(),
  }),
  applicationInstructions: z.string().optional(),
  contactInfo: z.object({
    email: z.string().optional(),
    phone: z.string().optional(),
    person: z.string().optional(),
  }),
});

export interface ValidateListingsOptions {
  onInvalid?: (issues: z.ZodIssue[], listing: unknown) => void;
}

export function validateListings(listings: unknown[], options?: ValidateListingsOptions): ValidatedJobListing[] {
  const valid: ValidatedJobListing[] = [];

  for (const listing of listings) {
    const result = jobListingSchema.safeParse(listing);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, listing);
    }
  }

  return valid;
}
