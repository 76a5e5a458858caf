import type { CapabilityHandler } from "@errand/schemas";

/** Declared so the decision function can ask for it; the guard always refuses. */
export const deleteFileHandler: CapabilityHandler = async () => {
  throw new Error("delete not permitted");
};
