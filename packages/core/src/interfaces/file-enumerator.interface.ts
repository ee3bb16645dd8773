export interface IFileEnumerator {
	/**
	 * Absolute paths of every regular file below `root`, in processing order.
	 * Symbolic links are never followed or returned.
	 */
	listFiles(root: string): Promise<string[]>;
}
