/**
 * Lint categories allowed on every run. Anything else the tool reports
 * fails the run.
 */
export const SUPPRESSED_LINTS: readonly string[] = [
  "clippy::bool_assert_comparison",
  "clippy::cognitive_complexity",
  "clippy::collapsible_else_if",
  "clippy::collapsible_if",
  "clippy::enum_variant_names",
  "clippy::from_over_into",
  "clippy::identity_op",
  "clippy::len_without_is_empty",
  "clippy::len_zero",
  "clippy::let_and_return",
  "clippy::manual_range_contains",
  "clippy::match_like_matches_macro",
  "clippy::missing_safety_doc",
  "clippy::module_inception",
  "clippy::needless_doctest_main",
  "clippy::needless_range_loop",
  "clippy::needless_return",
  "clippy::new_without_default",
  "clippy::ptr_arg",
  "clippy::redundant_field_names",
  "clippy::result_unit_err",
  "clippy::single_match",
  "clippy::too_many_arguments",
  "clippy::type_complexity",
  "clippy::unreadable_literal",
  "clippy::upper_case_acronyms",
  "clippy::useless_format",
  "clippy::wrong_self_convention",
];
