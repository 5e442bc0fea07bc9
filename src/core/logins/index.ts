export { generateLogins, loginSequence, importLogins } from './login-generator'
