import { pgEnum } from "drizzle-orm/pg-core";
import { PROJECT_STATES } from "../../shared/types.js";

export const projectState = pgEnum("project_state", PROJECT_STATES);
