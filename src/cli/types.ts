export type CliOptions = {
	source?: string;
	destination?: string;
	config?: string;
	timeoutMs?: number;
	dryRun: boolean;
	json: boolean;
	silent: boolean;
	verbose: boolean;
};
