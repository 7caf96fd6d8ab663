/**
 * @file errors.ts
 * @description
 *
 * @license MIT
 * @copyright 2024
 *
 * THE SOFTWARE IS PROVIDED “AS IS”, WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED,
 * INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR
 * PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR COPYRIGHT HOLDERS BE
 * LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT,
 * TORT OR OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE
 * USE OR OTHER DEALINGS IN THE SOFTWARE.
 */

import { ZodError } from 'zod';

export abstract class SwitchTowerError extends Error {
	constructor(message?: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class UnknownHardwareConfigError extends SwitchTowerError {
	constructor(public readonly hwConfig: string) {
		super(`Unknown hardware configuration '${hwConfig}'.`);
	}
}

export class InvalidTowerGeometryError extends SwitchTowerError {}

/** The job file could not be read as a valid job description. */
export class JobConfigError extends SwitchTowerError {
	constructor(
		message: string,
		public readonly zodError?: ZodError,
	) {
		super(message, { cause: zodError });
	}
}

/** The job describes layers or tool changes in an order the tower cannot be printed in. */
export class JobSequenceError extends SwitchTowerError {
	constructor(
		message: string,
		public readonly layerIndex: number,
	) {
		super(message);
	}
}
