import { z } from 'zod';
import { ValidationError } from "../infra/errors";

const id = z.string().min(1, 'must not be empty');
const latitude = z.number().finite().min(-90).max(90);
const longitude = z.number().finite().min(-180).max(180);

export const RegisterLotSchema = z.object({
  lotId: id,
  maxCapacity: z.number().int().positive('maxCapacity must be a positive integer'),
  latitude: latitude.default(0),
  longitude: longitude.default(0),
});

export const OccupancyReportSchema = z.object({
  lotId: id,
  currentOccupancy: z.number().int().nonnegative(),
  timestamp: z.number().int().nonnegative().optional(),
  edgeServerId: z.string().min(1).optional(),
});

export const NearbyQuerySchema = z.object({
  latitude,
  longitude,
  limit: z.number().int().positive(),
  onlyAvailable: z.boolean().default(false),
});

export const CarEnteredSchema = z.object({
  licensePlate: id,
  entryTimestamp: z.number().int().nonnegative().optional(),
});

export const BookingRequestSchema = z.object({
  lotId: id,
  licensePlate: id,
});

export const LotIdSchema = id;
export const LicensePlateSchema = id;

export type RegisterLotInput = z.input<typeof RegisterLotSchema>;
export type OccupancyReportInput = z.input<typeof OccupancyReportSchema>;
export type NearbyQueryInput = z.input<typeof NearbyQuerySchema>;
export type CarEnteredInput = z.input<typeof CarEnteredSchema>;
export type BookingRequestInput = z.input<typeof BookingRequestSchema>;

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.') || what}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid ${what}: ${detail}`, result.error.issues);
  }
  return result.data;
}
