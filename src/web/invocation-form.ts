// src/web/invocation-form.ts
import { z } from "zod";
import type { InvocationRequest } from "../core/gateway.js";
import type { Upload } from "../core/temp-artifact.js";

export const InvocationFormSchema = z.object({
  method: z.string().min(1),
  device: z.string().min(1),
  input_file: z.union([z.instanceof(File), z.string()]).optional(),
});

export type InvocationForm = z.infer<typeof InvocationFormSchema>;

export type FormReadResult =
  | { ok: true; request: InvocationRequest }
  | { ok: false; error: string };

export const MISSING_FIELDS_ERROR = "Missing required fields: method, device";

async function toUpload(value: File | string | undefined): Promise<Upload | undefined> {
  if (value === undefined || value === "") return undefined;
  if (typeof value === "string") {
    return { content: new TextEncoder().encode(value) };
  }
  // Browsers send an unnamed empty part when no file was picked
  if (value.size === 0 && value.name === "") return undefined;
  return {
    content: new Uint8Array(await value.arrayBuffer()),
    filename: value.name || undefined,
  };
}

/** Validate a parsed multipart body and turn it into a gateway request. */
export async function readInvocationForm(
  body: Record<string, unknown>,
): Promise<FormReadResult> {
  const parsed = InvocationFormSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: MISSING_FIELDS_ERROR };
  }
  const { method, device, input_file } = parsed.data;
  return {
    ok: true,
    request: { method, device, upload: await toUpload(input_file) },
  };
}
