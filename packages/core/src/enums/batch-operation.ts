export enum BatchOperation {
	ENCRYPT = 'encrypt',
	DECRYPT = 'decrypt',
}
