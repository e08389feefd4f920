/**
 * File access used by the edit pipeline. Relative paths are resolved against the working directory,
 * and paths outside of it are refused.
 */
export interface IFileSystemService {
	/**
	 * The directory all relative paths are resolved against
	 */
	getWorkingDirectory(): string;

	/**
	 * @param filePath path relative to the working directory
	 * @returns true if a regular file exists at the path
	 */
	fileExists(filePath: string): Promise<boolean>;

	/**
	 * Reads a UTF-8 text file.
	 * @throws FileNotFound if the file does not exist
	 */
	readFile(filePath: string): Promise<string>;

	/**
	 * Writes a UTF-8 text file, creating any missing parent directories.
	 */
	writeFile(filePath: string, contents: string): Promise<void>;

	/**
	 * Copies a file, overwriting the destination if it exists.
	 */
	copyFile(sourcePath: string, destinationPath: string): Promise<void>;

	/**
	 * Resolves the symbolic links in a path. For a path which does not exist yet, the real path of the
	 * nearest existing ancestor is joined with the missing segments.
	 * @returns an absolute path
	 */
	realPath(filePath: string): Promise<string>;
}
