export { validateSearchSpec } from "./validateSearchSpec";
