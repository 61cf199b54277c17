export {
	type FailureProducer,
	type Success,
	type Failure,
	type Result,
	success,
	failure,
	isSuccess,
	isFailure,
	producerOf,
	fold,
	swap,
	foreach,
	getOrElse,
	orElse,
	contains,
	forall,
	exists,
	flatMap,
	flatten,
	map,
	toOptional,
	toStandardResult,
	equals,
	formatResult,
	describeValue,
} from "./result.js";

export {
	safeFold,
	safeForeach,
	safeForall,
	safeExists,
	safeFlatMap,
	safeMap,
	safeCall,
	safeResultFn,
} from "./safe.js";

export { FailureProjection, projection } from "./projection.js";

export {
	type ErrorEntry,
	type ErrorDetail,
	type StringResult,
	ERROR_CATEGORY,
	entry,
	emptyErrorDetail,
	errorDetailWith,
	add,
	detailProducer,
	detailFromThrown,
	successOf,
	failureOf,
	containsDeep,
	formatDetail,
	isErrorDetail,
} from "./error-detail.js";
