export { digCavern } from "./generator";
