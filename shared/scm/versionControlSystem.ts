/**
 * The subset of version control operations the edit pipeline relies on.
 */
export interface VersionControlSystem {
	/**
	 * @param filePath path relative to the working directory
	 * @returns true if the file has uncommitted changes (staged or unstaged)
	 */
	isDirty(filePath: string): Promise<boolean>;
}
