export { FsGlob, type Glob, type GlobMatches, globMatch, toPosixPath } from "./glob.js";
export { cleanPath } from "./path.js";
export { isDir, isFile, modifiedTime } from "./stat.js";
