import { describe, expect, test } from "vitest";
import { z } from "zod";
import { ValidationError, formatZodIssues } from "../exceptions";

const RecordSchema = z.array(z.object({ status: z.enum(["Accepting", "Unclear"]) }));

describe("formatZodIssues", () => {
	test("should prefix each issue with its path", () => {
		const result = RecordSchema.safeParse([{ status: "Unclear" }, {}]);

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(formatZodIssues(result.error)).toEqual(["1.status: Required"]);
		}
	});

	test("should mark issues on the value itself as (root)", () => {
		const result = RecordSchema.safeParse("nope");

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(formatZodIssues(result.error)).toEqual(["(root): Expected array, received string"]);
		}
	});
});

describe("ValidationError.fromZodError", () => {
	test("should carry the formatted issues in its message", () => {
		const result = RecordSchema.safeParse([{}]);

		expect(result.success).toBe(false);
		if (!result.success) {
			const error = ValidationError.fromZodError("Bad answer", result.error);
			expect(error.issues).toEqual(["0.status: Required"]);
			expect(error.message).toBe("Bad answer: 0.status: Required");
		}
	});
});
