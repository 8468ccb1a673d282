const EXTENSIONS: Record<string, string> = {
  python: ".py",
  julia: ".jl",
  r: ".r",
  ruby: ".rb",
  rust: ".rs",
  go: ".go",
  javascript: ".js",
  typescript: ".ts",
  lua: ".lua",
  scala: ".scala",
  kotlin: ".kt",
  java: ".java",
  cpp: ".cpp",
  c: ".c",
};

/** File extension the analysis backend uses to pick a language for the shadow view. */
export const languageExtension = (language: string): string => {
  const key = language.trim().toLowerCase();
  return EXTENSIONS[key] ?? `.${key}`;
};
