import { type z } from "zod";

/** Flattens zod issues into `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return path === "" ? issue.message : `${path}: ${issue.message}`;
    });
}
