import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["packages/store", "packages/server"]);
