/** Reads the `code` of a Node system error such as ENOENT or EACCES. */
export const errnoCode = (error: unknown): string | undefined => {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
