/**
 * Testing utilities for code built on argloom.
 * Import via: import { captureArgError } from "@argloom/sdk/testing";
 */

export { captureArgError, captureRegistrationError } from "./capture.js";
