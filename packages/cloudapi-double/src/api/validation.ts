// =============================================================================
// REQUEST BODY SCHEMAS: decode-time validation for create/update bodies
// =============================================================================
// A null JSON value for a field leaves that field at its default, and an empty
// body (or a literal `null`) decodes as all defaults. Every other mismatch is
// reported with the offending field path.

import { CloudApiError, type CreateMachineInput } from "@cloudapi-double/core";
import { z } from "zod";

export const createKeySchema = z
	.object({
		name: z.string().nullish(),
		key: z.string().nullish(),
	})
	.transform((body) => ({ name: body.name ?? "", key: body.key ?? "" }));

/** Shared by firewall rule create and update. */
export const firewallRuleSchema = z
	.object({
		rule: z.string().nullish(),
		enabled: z.boolean().nullish(),
	})
	.transform((body) => ({ rule: body.rule ?? "", enabled: body.enabled ?? false }));

const TAG_PREFIX = "tag.";
const METADATA_PREFIX = "metadata.";

/**
 * Machine create body: `name`, `package`, `image`, `networks`, plus any
 * number of `tag.<name>` and `metadata.<name>` string fields. Other keys are
 * ignored.
 */
export const createMachineSchema = z
	.object({
		name: z.string().nullish(),
		package: z.string().nullish(),
		image: z.string().nullish(),
		networks: z.array(z.string()).nullish(),
	})
	.catchall(z.unknown())
	.transform((body, ctx): CreateMachineInput => {
		const tags: Record<string, string> = {};
		const metadata: Record<string, string> = {};

		for (const [key, value] of Object.entries(body)) {
			if (value === null || value === undefined) continue;

			let target: Record<string, string>;
			let name: string;
			if (key.startsWith(TAG_PREFIX)) {
				target = tags;
				name = key.slice(TAG_PREFIX.length);
			} else if (key.startsWith(METADATA_PREFIX)) {
				target = metadata;
				name = key.slice(METADATA_PREFIX.length);
			} else {
				continue;
			}

			if (typeof value !== "string") {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: [key],
					message: `Expected string, received ${Array.isArray(value) ? "array" : typeof value}`,
				});
				continue;
			}
			target[name] = value;
		}

		return {
			name: body.name ?? "",
			package: body.package ?? "",
			image: body.image ?? "",
			networks: body.networks ?? undefined,
			metadata,
			tags,
		};
	});

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "body"}: ${issue.message}`)
		.join("; ");
}

/**
 * Decode a raw JSON body against a schema. Failures throw
 * `CloudApiError("INVALID_ARGUMENT")`.
 */
export function decodeBody<S extends z.ZodTypeAny>(schema: S, raw: string | undefined): z.output<S> {
	let value: unknown = {};
	if (raw) {
		try {
			value = JSON.parse(raw) ?? {};
		} catch (error) {
			throw CloudApiError.invalidArgument(
				`invalid JSON body: ${error instanceof Error ? error.message : String(error)}`,
				error,
			);
		}
	}

	const result = schema.safeParse(value);
	if (!result.success) {
		throw new CloudApiError("INVALID_ARGUMENT", formatIssues(result.error), {
			details: { issues: result.error.issues },
		});
	}
	return result.data;
}
