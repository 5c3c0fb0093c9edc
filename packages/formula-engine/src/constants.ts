/**
 * Conversion constants shared by the prebuilt greenhouse-gas formulas.
 */

/** Mass ratio of CO2 to carbon (molar masses 44 / 12) */
export const CARBON_TO_CO2_RATIO = 44 / 12

/** Mass ratio of N2O to nitrogen (molar masses 44 / 28) */
export const NITROGEN_TO_N2O_RATIO = 44 / 28

/** Emission factors for CH4 and N2O are tabulated in kg per unit of fuel; results are in tonnes */
export const KG_PER_TONNE = 1000
