import { describeError, type HarnessError, type Logger, toError } from "@seedline/core";

interface Resource {
	readonly name: string;
	close(): Promise<void>;
}

/**
 * Resources acquired during bootstrap, released in reverse order of
 * acquisition. Closing is idempotent and never throws: failures are logged,
 * attached to the primary error (when there is one) and returned.
 */
export class ResourceScope {
	private readonly resources: Resource[] = [];

	constructor(private readonly logger: Logger) {}

	/** Names of the resources still held, in acquisition order. */
	get held(): string[] {
		return this.resources.map((r) => r.name);
	}

	/** Register a resource to release on {@link close}. */
	add(name: string, close: () => Promise<void>): void {
		this.resources.push({ name, close });
	}

	/** Release every resource, newest first. */
	async close(primary?: HarnessError): Promise<Error[]> {
		const failures: Error[] = [];
		for (let resource = this.resources.pop(); resource; resource = this.resources.pop()) {
			const failure = await this.release(resource);
			if (failure) {
				failures.push(failure);
				primary?.addSuppressed(failure);
			}
		}
		return failures;
	}

	private async release(resource: Resource): Promise<Error | undefined> {
		try {
			await resource.close();
			this.logger.debug("resource released", { resource: resource.name });
			return undefined;
		} catch (error) {
			const failure = toError(error);
			this.logger.warn("failed to release resource", { resource: resource.name, ...describeError(failure) });
			return failure;
		}
	}
}
