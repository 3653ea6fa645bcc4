export {
	bytesToHex,
	hexToBytes,
	stringToBytes,
	concatBytes,
	isHexOfLength,
} from "./encoding.js";
