/**
 * Portable image layout and validation types.
 */

/**
 * Relative locations of the required members of an installation image.
 */
export interface ImageLayout {
  executable: string;
  flag_file: string;
  /** Text the flag file must contain */
  flag_marker: string;
  library_archive: string;
  synth_drivers_dir: string;
  locale_dir: string;
  addons_dir: string;
  /** Case-sensitive tokens; an add-on directory name must contain one of them */
  addon_tokens: string[];
}

/**
 * Result of validating an image directory.
 */
export interface ImageValidation {
  /** All members present, flag marker found, and a matching add-on installed */
  ok: boolean;
  /** Relative paths of absent members, in layout order */
  missing: string[];
  has_flag: boolean;
  has_addon: boolean;
  /** Names of add-on directories that matched a token */
  addon_dirs: string[];
}
