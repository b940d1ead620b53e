export default ['Shared', 'Controller'];
