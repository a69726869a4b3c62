import dotenv from "dotenv";

dotenv.config();

// Store URLs and LOG_LEVEL are read from process.env by their consumers

export const config = {
  PORT: process.env.PORT || "3000",
  // Directory holding .codesweep.yml
  CODESWEEP_CONFIG_DIR: process.env.CODESWEEP_CONFIG_DIR || process.cwd(),
};
