import { includeIgnoreFile } from "@eslint/compat";
import dequekitConfig from "@dequekit/eslint-config";
import path from "node:path";

const gitignorePath = path.resolve(import.meta.dirname, "../../.gitignore");

const configs = [
  includeIgnoreFile(gitignorePath),
  ...dequekitConfig,
  {
    languageOptions: {
      parserOptions: {
        projectService: true,
        tsconfigRootDir: import.meta.dirname,
      },
    },
  },
];

export default configs;
