/**
 * Query-string validation for the bhavcopy endpoints. Every input arrives as
 * a string (or is absent); blanks count as absent.
 */
import { format, isValid, parseISO } from "date-fns";
import { z } from "zod";
import { todayInIst } from "./market_calendar";
import {
  ALL_STOCKS,
  DEFAULT_SORT,
  ExportKind,
  FilterCriteria,
  INDEX_NAMES,
  PageSize,
  SORT_COLUMNS,
  SortSpec,
} from "./types/domain";

const INDEX_CHOICES = [ALL_STOCKS, ...INDEX_NAMES] as const;

const emptyToUndefined = (value: unknown): unknown =>
  value === "" || value === null ? undefined : value;

const optionalNumber = z.preprocess(
  emptyToUndefined,
  z.coerce.number().finite().optional()
);

const numberWithDefault = (min: number, max: number, fallback: number) =>
  z.preprocess(
    emptyToUndefined,
    z.coerce.number().finite().min(min).max(max).default(fallback)
  );

const pageSizeSchema = z.preprocess(
  emptyToUndefined,
  z.coerce
    .number()
    .pipe(
      z.union([z.literal(25), z.literal(50), z.literal(100), z.literal(200)])
    )
    .optional()
);

export interface BhavcopyQuery {
  /** yyyy-MM-dd */
  tradeDate: string;
  criteria: FilterCriteria;
  sort: SortSpec;
  page: number;
  pageSize?: PageSize;
}

export interface BhavcopyExportQuery extends BhavcopyQuery {
  kind: ExportKind;
}

export function createBhavcopyQuerySchema(now: () => Date = () => new Date()) {
  return z
    .object({
      date: z
        .string()
        .trim()
        .regex(/^\d{4}-\d{2}-\d{2}$/, "date must be yyyy-MM-dd")
        .refine(isCalendarDate, "date is not a valid calendar date")
        .refine(
          value => value <= todayInIst(now()),
          "date cannot be in the future"
        ),
      minChange: optionalNumber,
      maxChange: optionalNumber,
      minDelivery: numberWithDefault(0, 100, 0),
      maxDelivery: numberWithDefault(0, 100, 100),
      minVolume: numberWithDefault(0, Number.MAX_SAFE_INTEGER, 0),
      minTurnover: numberWithDefault(0, Number.MAX_VALUE, 0),
      index: z.preprocess(
        value => {
          const blank = emptyToUndefined(value);
          return typeof blank === "string" ? blank.trim().toUpperCase() : blank;
        },
        z.enum(INDEX_CHOICES).default(ALL_STOCKS)
      ),
      search: z.preprocess(emptyToUndefined, z.string().trim().optional()),
      sortBy: z.preprocess(
        emptyToUndefined,
        z.enum(SORT_COLUMNS).default(DEFAULT_SORT.column)
      ),
      sortOrder: z.preprocess(
        emptyToUndefined,
        z.enum(["asc", "desc"]).default(DEFAULT_SORT.direction)
      ),
      page: z.preprocess(
        emptyToUndefined,
        z.coerce.number().int().min(1).default(1)
      ),
      pageSize: pageSizeSchema,
    })
    .transform(
      (input): BhavcopyQuery => ({
        tradeDate: input.date,
        criteria: {
          minChange: input.minChange,
          maxChange: input.maxChange,
          minDelivery: input.minDelivery,
          maxDelivery: input.maxDelivery,
          minVolume: input.minVolume,
          minTurnover: input.minTurnover,
          index: input.index,
          search: input.search,
        },
        sort: { column: input.sortBy, direction: input.sortOrder },
        page: input.page,
        pageSize: input.pageSize,
      })
    );
}

export function createBhavcopyExportQuerySchema(
  now: () => Date = () => new Date()
) {
  const kindSchema = z.object({
    kind: z.preprocess(
      emptyToUndefined,
      z.enum(["filtered", "complete", "top"]).default("filtered")
    ),
  });
  return z
    .intersection(createBhavcopyQuerySchema(now), kindSchema)
    .transform((input): BhavcopyExportQuery => input);
}

function isCalendarDate(value: string): boolean {
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, "yyyy-MM-dd") === value;
}
