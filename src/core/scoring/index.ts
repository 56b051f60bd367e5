export { OutcomeClassifier } from './outcome-classifier'
export { ReconciliationExplainer } from './explainer'
