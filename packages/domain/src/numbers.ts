/**
 * Numeric normalization
 *
 * The vendor sends prices and quantities as JSON numbers in some payloads
 * and as decimal strings in others ("filled_qty": "10", "p": 187.25).
 * Every schema that reads such a field goes through the helpers below.
 */

import { z } from "zod";

/**
 * Parse a number-or-decimal-string, returning undefined for anything that
 * is not a finite number
 *
 * @example
 * ```ts
 * parseFlexibleNumber("187.25"); // 187.25
 * parseFlexibleNumber(3);        // 3
 * parseFlexibleNumber("abc");    // undefined
 * ```
 */
export function parseFlexibleNumber(value: number | string): number | undefined {
	if (typeof value === "string" && value.trim() === "") {
		return undefined;
	}
	const parsed = typeof value === "number" ? value : Number(value);
	return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Required numeric field, accepting a number or a decimal string
 */
export const FlexibleNumberSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
	const parsed = parseFlexibleNumber(value);
	if (parsed === undefined) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `Expected a number or numeric string, got ${JSON.stringify(value)}`,
		});
		return z.NEVER;
	}
	return parsed;
});

/**
 * Optional numeric field; `null` and absence both become `undefined`
 */
export const OptionalFlexibleNumberSchema = FlexibleNumberSchema.nullish().transform(
	(value) => value ?? undefined,
);

/**
 * Optional list; `null` and absence both become an empty list
 */
export function nullableList<T extends z.ZodTypeAny>(item: T) {
	return z
		.array(item)
		.nullish()
		.transform((value): z.output<T>[] => value ?? []);
}
