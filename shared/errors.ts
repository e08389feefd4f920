export class FileNotFound extends Error {
	code: string;
	constructor(message: string, code = 'ENOENT') {
		super(message);
		this.name = 'FileNotFound';
		this.code = code;
	}
}

export class NotAllowed extends Error {
	code = 'NOT_ALLOWED';

	constructor(message: string) {
		super(message);
		this.name = 'NotAllowed';
	}
}
