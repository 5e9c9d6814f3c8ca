export default { name: "placeholder" };
