export { type FetchFn, TfeStateSource, type TfeStateSourceConfig } from './tfe'
