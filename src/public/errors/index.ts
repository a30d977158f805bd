export {JoblineError} from "./JoblineError";
export {ConfigError} from "./ConfigError";
export {CheckoutError} from "./CheckoutError";
export {ProvisionError} from "./ProvisionError";
export {UploadError} from "./UploadError";
