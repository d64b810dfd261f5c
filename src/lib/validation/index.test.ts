import { describe, expect, it } from "vitest";
import { AdapterError, ErrorCategory } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { ValidationError, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.number().int(), 3000);

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe(3000);
			}
		});

		it("returns the transformed output type", () => {
			const schema = z.string().transform((s) => s.length);
			const result = validate(schema, "abcd");

			expect(result.ok && result.value).toBe(4);
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error).toBeInstanceOf(AdapterError);
				expect(result.error.code).toBe("VALIDATION_FAILED");
				expect(result.error.category).toBe(ErrorCategory.Configuration);
			}
		});

		it("reports every failing path", () => {
			const schema = z.object({
				fees: z.object({
					defaultFee: z.number(),
					governanceFee: z.number(),
				}),
			});
			const result = validate(schema, { fees: { defaultFee: "x", governanceFee: "y" } });

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.issues.map((i) => i.path)).toEqual([
					["fees", "defaultFee"],
					["fees", "governanceFee"],
				]);
			}
		});

		it("prefixes the message with the label", () => {
			const result = validate(z.object({ fee: z.number().max(10) }), { fee: 11 }, "fee config");

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message.startsWith("Invalid fee config: fee: ")).toBe(true);
			}
		});
	});
});
