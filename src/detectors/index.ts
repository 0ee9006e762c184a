import type { DetectorSet } from "../core/types.js";
import { apiKeyDetector } from "./api-key.js";
import { codeDetector } from "./code.js";
import { emailDetector } from "./email.js";
import { envVarDetector } from "./env-var.js";
import { filePathDetector } from "./file-path.js";
import { hashDetector } from "./hash.js";
import { ipAddressDetector } from "./ip-address.js";
import { jwtDetector } from "./jwt.js";
import { phoneNumberDetector } from "./phone-number.js";
import { proseDetector } from "./prose.js";
import { shellCommandDetector } from "./shell-command.js";
import { urlDetector } from "./url.js";
import { uuidDetector } from "./uuid.js";

export const DEFAULT_DETECTORS: DetectorSet = {
  jwt: jwtDetector,
  url: urlDetector,
  email: emailDetector,
  uuid: uuidDetector,
  ipAddress: ipAddressDetector,
  apiKey: apiKeyDetector,
  hash: hashDetector,
  phoneNumber: phoneNumberDetector,
  filePath: filePathDetector,
  env: envVarDetector,
  shellCommand: shellCommandDetector,
  code: codeDetector,
  prose: proseDetector,
};

export {
  apiKeyDetector,
  codeDetector,
  emailDetector,
  envVarDetector,
  filePathDetector,
  hashDetector,
  ipAddressDetector,
  jwtDetector,
  phoneNumberDetector,
  proseDetector,
  shellCommandDetector,
  urlDetector,
  uuidDetector,
};
export { isTestOrExampleKey } from "./api-key.js";
export { classifyCode } from "./code.js";
export { formatAssignment, isEnvBlock, parseAssignment } from "./env-var.js";
export { classifyFileType, createStatProbe, mimeTypeFor, noFileSystemProbe } from "./file-path.js";
export { analyzeProse } from "./prose.js";
export { scoreLine } from "./shell-command.js";
export { categorizeDomain } from "./url.js";
