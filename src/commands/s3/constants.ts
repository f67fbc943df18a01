export const ARG_BUCKET = "bucket";
export const ARG_OLDER_THAN = "older-than";
export const ARG_APPLY = "apply";
export const ARG_DRY_RUN = "dry-run";
export const ARG_YES = "yes";
export const ARG_YES_ALIAS = "y";

/** A century; beyond this the cutoff leaves the range of a Date. */
export const MAX_OLDER_THAN_DAYS = 36_500;
